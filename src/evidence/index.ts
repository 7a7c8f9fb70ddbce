export * from "./extractEvidence";
