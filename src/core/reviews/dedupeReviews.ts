import { createHash } from "crypto";
import type { ReviewRecord } from "./review.types";

export const normalizeReviewerName = (name: string): string => name.replace(/\s+/g, " ").trim().toLowerCase();

/**
 * Identity of a review inside one place: reviewer, date phrase and a digest of
 * the comment. Identical reviews collapse into one key.
 */
export const reviewKey = (record: ReviewRecord): string => {
  const commentDigest = createHash("sha1").update(record.comment, "utf8").digest("hex");
  return `${normalizeReviewerName(record.reviewerName)}|${record.date}|${commentDigest}`;
};

export type DedupeResult = {
  newRecords: ReviewRecord[];
  keys: ReadonlySet<string>;
  duplicates: number;
};

/**
 * Returns the incoming records whose key is not yet in `existing`, and a new
 * key set extended with them. `existing` is left untouched.
 */
export const dedupeReviews = (existing: ReadonlySet<string>, incoming: readonly ReviewRecord[]): DedupeResult => {
  const keys = new Set(existing);
  const newRecords: ReviewRecord[] = [];

  for (const record of incoming) {
    const key = reviewKey(record);
    if (keys.has(key)) continue;
    keys.add(key);
    newRecords.push(record);
  }

  return { newRecords, keys, duplicates: incoming.length - newRecords.length };
};
