import type { RawCoordinate } from "../coordinates";
import type { ArticleDocument } from "../crawl";
import type { ExtractionMethodId } from "../types";

export interface CoordinateExtractionMethod {
  readonly id: ExtractionMethodId;
  readonly description: string;
  /** Returns the raw coordinate this method targets, or `undefined` when its structure is absent or malformed. */
  attempt(document: ArticleDocument): RawCoordinate | undefined;
}
