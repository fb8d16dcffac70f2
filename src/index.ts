export * from "@/models";
export * from "@/engine";
export * from "@/store";
