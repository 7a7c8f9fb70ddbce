export * from "./draftStore";
