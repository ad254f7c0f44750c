import type { CombinedReviewRow, ReviewGroup } from "../core/merge/mergeReviews";

/** A per-place export as found on disk, not yet validated. */
export type PlaceExportFile = {
  sourceLocation: string;
  sourceFile: string;
  payload: unknown;
};

export type PlaceExportListing = {
  files: PlaceExportFile[];
  skipped: number;    // folders without a readable export
};

export interface PlaceExportSource {
  listPlaceExports(): Promise<PlaceExportListing>;
}

export interface MergedReviewSink {
  writeCombined(rows: readonly CombinedReviewRow[]): Promise<void>;
  writeGroups(groups: readonly ReviewGroup[]): Promise<void>;
}
