export * from "./types";
export * from "./votes";
export * from "./configLoader";
export * from "./reputationService";
