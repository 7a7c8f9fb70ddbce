export * from "./parseArgs";
export * from "./runTailor";
