import type { PlaceConfig } from "../core/places/place.types";
import type { BatchSummary, ScrapeResult } from "../core/scrape/ScrapeResult";

export interface ResultSink {
  writePlaceResult(place: PlaceConfig, result: ScrapeResult): Promise<void>;
  writeSummary(summary: BatchSummary): Promise<void>;
}
