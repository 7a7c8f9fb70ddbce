export * from "./logger";
export * from "./coverage";
export * from "./verification";
export * from "./generation";
export * from "./providers";
export * from "./clients/http";
export * from "./schema";
