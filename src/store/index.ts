export * from "@/store/ratingStore";
