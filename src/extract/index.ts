import type { LabelTermTable } from "../config";
import type { AddressPolicy } from "../geocode/addressCleaner";
import { InfoboxAddressExtractor } from "./addressExtractor";
import type { CoordinateExtractionMethod } from "./coordinateMethod";
import { GeoMetadataMethod } from "./geoMetadataMethod";
import { IndicatorMethod } from "./indicatorMethod";
import { InfoboxMethod } from "./infoboxMethod";
import { InlineSpanMethod } from "./inlineSpanMethod";
import { MapDataMethod } from "./mapDataMethod";
import { ExtractionPipeline } from "./pipeline";
import { ScriptVariableMethod } from "./scriptVariableMethod";

export interface PipelineSettings {
  labelTerms: LabelTermTable;
  defaultLanguage: string;
  addressPolicy: AddressPolicy;
}

/** Extraction methods in priority order. */
export function createDefaultMethods(labelTerms: LabelTermTable, defaultLanguage: string): CoordinateExtractionMethod[] {
  return [
    new InlineSpanMethod(),
    new IndicatorMethod(),
    new InfoboxMethod(labelTerms, defaultLanguage),
    new ScriptVariableMethod(),
    new GeoMetadataMethod(),
    new MapDataMethod(),
  ];
}

export function createExtractionPipeline(settings: PipelineSettings): ExtractionPipeline {
  return new ExtractionPipeline(
    createDefaultMethods(settings.labelTerms, settings.defaultLanguage),
    new InfoboxAddressExtractor(settings.labelTerms, settings.defaultLanguage),
    settings.addressPolicy,
  );
}

export * from "./addressExtractor";
export * from "./coordinateMethod";
export * from "./geoMetadataMethod";
export * from "./indicatorMethod";
export * from "./infobox";
export * from "./infoboxMethod";
export * from "./inlineSpanMethod";
export * from "./mapDataMethod";
export * from "./pipeline";
export * from "./scriptVariableMethod";
