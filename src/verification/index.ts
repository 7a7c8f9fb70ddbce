export * from "./amotParser";
export * from "./semanticCheck";
export * from "./componentVerifier";
export * from "./bulletAggregator";
export * from "./verificationService";
