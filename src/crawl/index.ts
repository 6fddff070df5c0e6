export * from "./htmlParser";
export * from "./pageFetcher";
