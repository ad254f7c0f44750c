import type { BatchSummary, ScrapeResult } from "../../src/core/scrape/ScrapeResult";
import { emptyScrapeStats } from "../../src/core/scrape/ScrapeResult";
import type { ResultSink } from "../../src/ports/ResultSink";
import { FanOutResultSink } from "../../src/infrastructure/sinks/FanOutResultSink";

const place = { name: "Blue Door", url: "https://maps.example.test/place/Blue+Door", outputName: "BlueDoor" };
const result: ScrapeResult = {
  location: "Blue Door",
  outputName: "BlueDoor",
  scrapedAt: new Date(0),
  coordinates: null,
  reviews: [],
  status: "partial_success",
  error: "Coordinates unavailable",
  stats: emptyScrapeStats()
};
const summary: BatchSummary = {
  entries: [],
  totals: { places: 0, reviews: 0, byStatus: { success: 0, partial_success: 0, failed: 0 } },
  generatedAt: new Date(0)
};

const recordingSink = (name: string, calls: string[], fail = false): ResultSink => ({
  writePlaceResult: async () => {
    calls.push(`${name}:place`);
    if (fail) throw new Error(`${name} down`);
  },
  writeSummary: async () => {
    calls.push(`${name}:summary`);
    if (fail) throw new Error(`${name} down`);
  }
});

describe("FanOutResultSink", () => {
  let warn: jest.SpyInstance;

  beforeEach(() => {
    warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("writes to the primary sink, then each secondary, in order", async () => {
    const calls: string[] = [];
    const sink = new FanOutResultSink(recordingSink("files", calls), [recordingSink("mongo", calls)]);

    await sink.writePlaceResult(place, result);
    await sink.writeSummary(summary);

    expect(calls).toEqual(["files:place", "mongo:place", "files:summary", "mongo:summary"]);
    expect(warn).not.toHaveBeenCalled();
  });

  it("propagates a primary failure without touching the secondaries", async () => {
    const calls: string[] = [];
    const sink = new FanOutResultSink(recordingSink("files", calls, true), [recordingSink("mongo", calls)]);

    await expect(sink.writePlaceResult(place, result)).rejects.toThrow("files down");
    expect(calls).toEqual(["files:place"]);
  });

  it("logs a secondary failure and resolves", async () => {
    const calls: string[] = [];
    const sink = new FanOutResultSink(recordingSink("files", calls), [
      recordingSink("mongo", calls, true),
      recordingSink("audit", calls)
    ]);

    await expect(sink.writePlaceResult(place, result)).resolves.toBeUndefined();
    await expect(sink.writeSummary(summary)).resolves.toBeUndefined();

    expect(calls).toEqual([
      "files:place", "mongo:place", "audit:place",
      "files:summary", "mongo:summary", "audit:summary"
    ]);
    expect(warn.mock.calls.map(([line]) => JSON.parse(String(line)))).toEqual([
      { event: "store.write_failed", target: "place", outputName: "BlueDoor", reason: "mongo down" },
      { event: "store.write_failed", target: "summary", reason: "mongo down" }
    ]);
  });
});
