export * from "./recordFile";
