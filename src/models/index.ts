export * from "@/models/base";
export * from "@/models/participant";
