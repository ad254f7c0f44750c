import {
  averageRowRating,
  DEFAULT_GROUP_THRESHOLD,
  dropExactDuplicates,
  groupSimilarReviews,
  InvalidExportError,
  rowsFromExportPayload,
  type CombinedReviewRow
} from "../../core/merge/mergeReviews";
import type { MergedReviewSink, PlaceExportSource } from "../../ports/MergeStore";

export type MergeOptions = {
  group: boolean;
  threshold: number;   // 0..1, used when grouping
};

export type MergeSummary = {
  filesRead: number;
  filesSkipped: number;
  totalRows: number;
  duplicatesRemoved: number;
  combinedRows: number;
  groups: number | null;
  averageRating: number | null;
};

export type MergeDeps = {
  source: PlaceExportSource;
  sink: MergedReviewSink;
};

/**
 * Combines every per-place export into one dataset. Exact duplicates
 * (same reviewer, comment text and date) are dropped before writing;
 * `group` additionally clusters near-identical comments across places.
 */
export const mergeExports = async (
  deps: MergeDeps,
  options: MergeOptions = { group: false, threshold: DEFAULT_GROUP_THRESHOLD }
): Promise<MergeSummary> => {
  const listing = await deps.source.listPlaceExports();

  const collected: CombinedReviewRow[] = [];
  let filesRead = 0;
  let filesSkipped = listing.skipped;

  for (const file of listing.files) {
    try {
      collected.push(...rowsFromExportPayload(file.payload, file));
      filesRead += 1;
    } catch (err) {
      if (!(err instanceof InvalidExportError)) throw err;
      filesSkipped += 1;
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({
        event: "merge.file_skipped",
        sourceLocation: file.sourceLocation,
        sourceFile: file.sourceFile,
        reason: err.message
      }));
    }
  }

  if (collected.length === 0) {
    console.log(JSON.stringify({ event: "merge.empty", filesRead, filesSkipped }));
    return {
      filesRead,
      filesSkipped,
      totalRows: 0,
      duplicatesRemoved: 0,
      combinedRows: 0,
      groups: null,
      averageRating: null
    };
  }

  const { rows, removed } = dropExactDuplicates(collected);
  await deps.sink.writeCombined(rows);

  let groups: number | null = null;
  if (options.group) {
    const grouped = groupSimilarReviews(rows, options.threshold);
    await deps.sink.writeGroups(grouped);
    groups = grouped.length;
  }

  const summary: MergeSummary = {
    filesRead,
    filesSkipped,
    totalRows: collected.length,
    duplicatesRemoved: removed,
    combinedRows: rows.length,
    groups,
    averageRating: averageRowRating(rows)
  };
  console.log(JSON.stringify({ event: "merge.completed", ...summary }));
  return summary;
};
