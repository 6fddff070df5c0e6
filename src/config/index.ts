export * from "./labelTerms";
export * from "./loadConfig";
export * from "./types";
