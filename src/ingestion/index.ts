export * from "./inputValidation";
export * from "./loadInputs";
