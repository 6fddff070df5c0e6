export * from "./addressCleaner";
export * from "./nominatimGeocoder";
