export * from "./format";
export * from "./parser";
