import { createHash } from "crypto";
import { dedupeReviews, normalizeReviewerName, reviewKey } from "../../src/core/reviews/dedupeReviews";
import type { ReviewRecord } from "../../src/core/reviews/review.types";

const record = (reviewerName: string, date: string, comment: string, rating = 5): ReviewRecord => ({
  reviewerName,
  rating,
  date,
  comment
});

describe("reviewKey", () => {
  it("joins normalized name, date and comment digest", () => {
    const digest = createHash("sha1").update("Lovely").digest("hex");

    expect(reviewKey(record("Ana  Lima", "a week ago", "Lovely"))).toBe(`ana lima|a week ago|${digest}`);
  });

  it("ignores case and whitespace in the reviewer name", () => {
    expect(normalizeReviewerName("  ANA \n Lima ")).toBe("ana lima");
    expect(reviewKey(record(" ana lima", "a week ago", "Lovely"))).toBe(reviewKey(record("Ana  Lima", "a week ago", "Lovely")));
  });

  it("does not depend on the rating", () => {
    expect(reviewKey(record("Ana", "today", "ok", 1))).toBe(reviewKey(record("Ana", "today", "ok", 5)));
  });
});

describe("dedupeReviews", () => {
  const batch = [record("Ana", "a week ago", "Lovely"), record("Ben", "2 weeks ago", "Good")];

  it("is idempotent across passes", () => {
    const first = dedupeReviews(new Set(), batch);
    const second = dedupeReviews(first.keys, batch);

    expect(first.newRecords).toEqual(batch);
    expect(second.newRecords).toEqual([]);
    expect(second.duplicates).toBe(2);
    expect(second.keys.size).toBe(2);
  });

  it("leaves the existing key set untouched", () => {
    const existing = new Set<string>();
    dedupeReviews(existing, batch);

    expect(existing.size).toBe(0);
  });

  it("collapses duplicates inside one batch", () => {
    const result = dedupeReviews(new Set(), [batch[0], batch[0]]);

    expect(result.newRecords).toEqual([batch[0]]);
    expect(result.duplicates).toBe(1);
  });

  it("keeps reviews that differ only in comment", () => {
    const result = dedupeReviews(new Set(), [record("Ana", "today", "First"), record("Ana", "today", "Second")]);

    expect(result.newRecords).toHaveLength(2);
  });
});
