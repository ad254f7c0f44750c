import type { Coordinates } from "../places/place.types";
import type { ReviewRecord } from "../reviews/review.types";

export type ScrapeStatus = "success" | "partial_success" | "failed";

export type LoaderTerminal = "exhausted" | "max_retries_exceeded" | "deadline_exceeded";

export type ScrapeStats = {
  passes: number;
  droppedItems: number;
  duplicates: number;
  backoffs: number;
  terminal?: LoaderTerminal;
};

export type ScrapeResult = {
  location: string;
  outputName: string;
  scrapedAt: Date;
  coordinates: Coordinates | null;
  reviews: readonly ReviewRecord[];
  status: ScrapeStatus;
  error?: string;
  stats: ScrapeStats;
};

export type BatchSummaryEntry = {
  outputName: string;
  location: string;
  reviewCount: number;
  averageRating: number | null;
  coordinates: Coordinates | null;
  status: ScrapeStatus;
  error?: string;
};

export type BatchSummary = {
  entries: BatchSummaryEntry[];
  totals: {
    places: number;
    reviews: number;
    byStatus: Record<ScrapeStatus, number>;
  };
  generatedAt: Date;
};

export const emptyScrapeStats = (): ScrapeStats => ({ passes: 0, droppedItems: 0, duplicates: 0, backoffs: 0 });

export const averageRating = (reviews: readonly ReviewRecord[]): number | null => {
  if (reviews.length === 0) return null;
  const sum = reviews.reduce((acc, review) => acc + review.rating, 0);
  return Math.round((sum / reviews.length) * 100) / 100;
};
