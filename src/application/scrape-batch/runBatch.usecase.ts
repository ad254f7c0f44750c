import { assertUniqueOutputNames } from "../../core/places/placeConfig";
import type { PlaceConfig } from "../../core/places/place.types";
import type { BatchSummary, ScrapeResult } from "../../core/scrape/ScrapeResult";
import type { PlaceBrowser } from "../../ports/ContentSource";
import type { ResultSink } from "../../ports/ResultSink";
import { sleep } from "../../shared/retry/retry";
import { describeError, wrapSinkFailure } from "../scrape-place/scrape.error-handler";
import { failedScrapeResult, scrapePlace } from "../scrape-place/scrapePlace.usecase";
import { resolveScraperConfig, type ScraperConfigInput } from "../scrape-place/scraper.config";
import { createBatchSummaryBuilder } from "./batchSummary";

export type RunBatchDeps = {
  browser: PlaceBrowser;
  sink: ResultSink;
  config: ScraperConfigInput;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  randomFn?: () => number;
};

/**
 * Scrapes places one after another and writes each result as soon as it is
 * known. A place that fails, for whatever reason, becomes a `failed` entry and
 * the loop moves on. Only a duplicate output name (before any work) or a
 * failure to write the final summary rejects.
 */
export const runBatch = async (deps: RunBatchDeps, places: readonly PlaceConfig[]): Promise<BatchSummary> => {
  assertUniqueOutputNames(places);

  const config = resolveScraperConfig(deps.config);
  const now = deps.now ?? Date.now;
  const wait = deps.sleep ?? sleep;
  const summaryBuilder = createBatchSummaryBuilder();

  for (const [index, place] of places.entries()) {
    if (index > 0 && config.placeDelayMs > 0) {
      await wait(config.placeDelayMs);
    }

    let result: ScrapeResult;
    try {
      result = await scrapePlace(
        { browser: deps.browser, config, now, sleep: deps.sleep, randomFn: deps.randomFn },
        place
      );
    } catch (err) {
      result = failedScrapeResult(place, err, new Date(now()));
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({ event: "scrape.place_failed", outputName: place.outputName, error: result.error }));
    }

    try {
      await deps.sink.writePlaceResult(place, result);
      summaryBuilder.add(result);
    } catch (err) {
      const sinkError = wrapSinkFailure(err, { target: "place", outputName: place.outputName });
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({
        event: "scrape.place_write_failed",
        outputName: place.outputName,
        code: sinkError.code,
        message: sinkError.message
      }));
      summaryBuilder.add(result, { status: "failed", error: describeError(sinkError) });
    }
  }

  const summary = summaryBuilder.finalize(new Date(now()));
  try {
    await deps.sink.writeSummary(summary);
  } catch (err) {
    throw wrapSinkFailure(err, { target: "summary" });
  }

  console.log(JSON.stringify({ event: "batch.completed", ...summary.totals }));
  return summary;
};
