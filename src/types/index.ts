export * from "./logger";
export * from "./config";
export * from "./requirements";
export * from "./profile";
export * from "./coverage";
export * from "./verification";
export * from "./generation";
export * from "./providers";
export * from "./store";
export * from "./db";
export * from "./clients/http";
// OpenAI payload types are intentionally NOT exported from the global barrel.
// Import directly from "@/types/clients/openai" within src/providers/openai/ only.
