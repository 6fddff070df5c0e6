export * from "./batchRunner";
export * from "./progress";
export * from "./statistics";
export * from "./summary";
