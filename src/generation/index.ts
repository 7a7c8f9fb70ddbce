export * from "./prompts";
export * from "./bulletGenerator";
export * from "./stats";
