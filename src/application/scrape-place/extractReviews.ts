import { extractReview } from "../../core/reviews/extractReview";
import type { RawReviewItem, ReviewRecord } from "../../core/reviews/review.types";
import { classifyExtractionFailure, type ScrapeStatsTracker } from "./scrape.error-handler";

/**
 * Parses one pass worth of raw items. A malformed item is logged and dropped;
 * nothing thrown by a single item escapes.
 */
export const extractReviews = (
  rawItems: readonly RawReviewItem[],
  context: { outputName: string; pass: number; tracker: ScrapeStatsTracker }
): { records: ReviewRecord[]; dropped: number } => {
  const records: ReviewRecord[] = [];
  let dropped = 0;

  rawItems.forEach((raw, index) => {
    try {
      records.push(extractReview(raw));
    } catch (reason) {
      const decision = classifyExtractionFailure(reason, { outputName: context.outputName, pass: context.pass, index });
      const skippedCount = context.tracker.addSkipped(decision.code);
      dropped += 1;
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({ ...decision.log, skippedCount }));
    }
  });

  return { records, dropped };
};
