import {
  averageRating,
  type BatchSummary,
  type BatchSummaryEntry,
  type ScrapeResult,
  type ScrapeStatus
} from "../../core/scrape/ScrapeResult";

/**
 * Accumulates one entry per finished place. Entries copy counts and status
 * only; review text stays with the ScrapeResult.
 */
export const createBatchSummaryBuilder = () => {
  const entries: BatchSummaryEntry[] = [];

  return {
    size: () => entries.length,
    add: (result: ScrapeResult, override?: { status: ScrapeStatus; error: string }) => {
      const status = override?.status ?? result.status;
      const reviewCount = status === "failed" ? 0 : result.reviews.length;
      const error = override?.error ?? result.error;
      const entry: BatchSummaryEntry = {
        outputName: result.outputName,
        location: result.location,
        reviewCount,
        averageRating: status === "failed" ? null : averageRating(result.reviews),
        coordinates: result.coordinates,
        status
      };
      if (error) {
        entry.error = error;
      }
      entries.push(entry);
      return entry;
    },
    finalize: (generatedAt: Date): BatchSummary => {
      const byStatus: Record<ScrapeStatus, number> = { success: 0, partial_success: 0, failed: 0 };
      let reviews = 0;
      for (const entry of entries) {
        byStatus[entry.status] += 1;
        reviews += entry.reviewCount;
      }
      return {
        entries: entries.map((entry) => ({ ...entry })),
        totals: { places: entries.length, reviews, byStatus },
        generatedAt
      };
    }
  };
};
