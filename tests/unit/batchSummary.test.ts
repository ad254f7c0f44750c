import { createBatchSummaryBuilder } from "../../src/application/scrape-batch/batchSummary";
import { averageRating, emptyScrapeStats, type ScrapeResult } from "../../src/core/scrape/ScrapeResult";

const result = (outputName: string, ratings: number[], overrides: Partial<ScrapeResult> = {}): ScrapeResult => ({
  location: `${outputName} location`,
  outputName,
  scrapedAt: new Date("2026-01-02T03:04:05Z"),
  coordinates: { latitude: 1, longitude: 2 },
  reviews: ratings.map((rating, i) => ({ reviewerName: `Guest ${i}`, rating, date: "today", comment: "" })),
  status: "success",
  stats: emptyScrapeStats(),
  ...overrides
});

describe("averageRating", () => {
  it("rounds to two decimals and is null without reviews", () => {
    expect(averageRating(result("A", [5, 4, 4]).reviews)).toBe(4.33);
    expect(averageRating([])).toBeNull();
  });
});

describe("batch summary builder", () => {
  it("adds one entry per place and totals them", () => {
    const builder = createBatchSummaryBuilder();
    builder.add(result("A", [5, 4]));
    builder.add(result("B", [], { status: "failed", error: "PanelNotFoundError: Review panel not found on page", coordinates: null }));
    builder.add(result("C", [3], { status: "partial_success", error: "Coordinates unavailable" }));

    const generatedAt = new Date("2026-01-02T04:00:00Z");
    const summary = builder.finalize(generatedAt);

    expect(builder.size()).toBe(3);
    expect(summary.generatedAt).toBe(generatedAt);
    expect(summary.entries).toEqual([
      { outputName: "A", location: "A location", reviewCount: 2, averageRating: 4.5, coordinates: { latitude: 1, longitude: 2 }, status: "success" },
      {
        outputName: "B",
        location: "B location",
        reviewCount: 0,
        averageRating: null,
        coordinates: null,
        status: "failed",
        error: "PanelNotFoundError: Review panel not found on page"
      },
      {
        outputName: "C",
        location: "C location",
        reviewCount: 1,
        averageRating: 3,
        coordinates: { latitude: 1, longitude: 2 },
        status: "partial_success",
        error: "Coordinates unavailable"
      }
    ]);
    expect(summary.totals).toEqual({ places: 3, reviews: 3, byStatus: { success: 1, partial_success: 1, failed: 1 } });
  });

  it("applies a status override with zero reviews", () => {
    const builder = createBatchSummaryBuilder();
    const entry = builder.add(result("A", [5, 5]), { status: "failed", error: "SinkWriteError: disk full" });

    expect(entry).toMatchObject({ status: "failed", reviewCount: 0, averageRating: null, error: "SinkWriteError: disk full" });
  });
});
