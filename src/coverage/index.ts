export * from "./similarity";
export * from "./keywords";
export * from "./analyzer";
export * from "./aggregator";
export * from "./queries";
export * from "./coverageMappingService";
