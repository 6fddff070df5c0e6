import { parseRawCoordinate } from "../coordinates";
import { toErrorMessage } from "../core/values";
import type { ArticleDocument } from "../crawl";
import { cleanAddress, isDetailedAddress } from "../geocode/addressCleaner";
import type { AddressPolicy } from "../geocode/addressCleaner";
import type { Coordinate, ExtractionMethodId } from "../types";
import type { AddressSource } from "./addressExtractor";
import type { CoordinateExtractionMethod } from "./coordinateMethod";

export interface RejectedCandidate {
  method: ExtractionMethodId;
  reason: string;
}

export type ExtractionOutcome =
  | { kind: "coordinate"; coordinate: Coordinate; rejected: RejectedCandidate[] }
  | { kind: "address"; address: string; detailed: boolean; rejected: RejectedCandidate[] }
  | { kind: "not_found"; rejected: RejectedCandidate[] };

/**
 * Runs the extraction methods in list order and keeps the first candidate that
 * parses. There is no scoring across methods: list position is the priority.
 * When no method yields a coordinate, the infobox address is returned instead.
 */
export class ExtractionPipeline {
  private readonly methods: readonly CoordinateExtractionMethod[];
  private readonly addressSource: AddressSource;
  private readonly addressPolicy: AddressPolicy;

  constructor(methods: readonly CoordinateExtractionMethod[], addressSource: AddressSource, addressPolicy: AddressPolicy) {
    this.methods = methods;
    this.addressSource = addressSource;
    this.addressPolicy = addressPolicy;
  }

  get methodIds(): ExtractionMethodId[] {
    return this.methods.map((method) => method.id);
  }

  extract(document: ArticleDocument): ExtractionOutcome {
    const rejected: RejectedCandidate[] = [];

    for (const method of this.methods) {
      let candidate;
      try {
        candidate = method.attempt(document);
      } catch (error) {
        rejected.push({ method: method.id, reason: `method threw: ${toErrorMessage(error)}` });
        continue;
      }
      if (!candidate) {
        continue;
      }

      const parsed = parseRawCoordinate(candidate);
      if (!parsed.ok) {
        rejected.push({ method: method.id, reason: parsed.reason });
        continue;
      }

      return {
        kind: "coordinate",
        coordinate: { ...parsed.value, method: method.id },
        rejected,
      };
    }

    const rawAddress = this.addressSource.extract(document);
    const address = rawAddress === undefined ? "" : cleanAddress(rawAddress);
    if (address) {
      return {
        kind: "address",
        address,
        detailed: isDetailedAddress(address, this.addressPolicy),
        rejected,
      };
    }

    return { kind: "not_found", rejected };
  }
}
