import { mergeExports, type MergeOptions, type MergeSummary } from "../application/merge-exports/mergeExports.usecase";
import { runBatch } from "../application/scrape-batch/runBatch.usecase";
import { scrapeOnePlace } from "../application/scrape-place/scrapeOne.usecase";
import type { PlaceConfig } from "../core/places/place.types";
import type { BatchSummary, ScrapeResult } from "../core/scrape/ScrapeResult";
import { LocationsFileStore } from "../infrastructure/config/LocationsFileStore";
import { FileResultSink, type OutputLayout } from "../infrastructure/files/FileResultSink";
import { MergedExportWriter } from "../infrastructure/files/MergedExportWriter";
import { PlaceExportReader } from "../infrastructure/files/PlaceExportReader";
import { MongoResultRepository } from "../infrastructure/mongo/MongoResultRepository";
import { PuppeteerPlaceBrowser } from "../infrastructure/puppeteer/PuppeteerPlaceBrowser";
import { FanOutResultSink } from "../infrastructure/sinks/FanOutResultSink";
import type { ResultSink } from "../ports/ResultSink";
import { loadEnv, type Env } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";

type WiredSink = { sink: ResultSink; close: () => Promise<void> };

const createResultSink = (env: Env, layout: OutputLayout): WiredSink => {
  const files = new FileResultSink(env.OUTPUT_DIR, layout);
  if (!env.MONGO_URI) {
    return { sink: files, close: async () => undefined };
  }

  const store = new MongoResultRepository(env.MONGO_URI);
  return { sink: new FanOutResultSink(files, [store]), close: () => store.close() };
};

const withScrapeResources = async <T>(
  env: Env,
  layout: OutputLayout,
  navigationTimeoutMs: number,
  run: (browser: PuppeteerPlaceBrowser, sink: ResultSink) => Promise<T>
): Promise<T> => {
  const browser = new PuppeteerPlaceBrowser({
    executablePath: env.CHROME_EXECUTABLE_PATH,
    headless: env.HEADLESS,
    navigationTimeoutMs,
    reviewSort: env.REVIEW_SORT
  });
  const { sink, close } = createResultSink(env, layout);

  try {
    return await run(browser, sink);
  } finally {
    try {
      await browser.close();
    } finally {
      await close();
    }
  }
};

export const runBatchScrape = async (): Promise<BatchSummary> => {
  const env = loadEnv();
  const runtime = loadRuntimeConfigFromEnv();
  const places = await new LocationsFileStore(env.LOCATIONS_FILE).loadPlaces();

  return withScrapeResources(env, "per_place", runtime.navigationTimeoutMs, (browser, sink) =>
    runBatch({ browser, sink, config: runtime.scraperConfig }, places)
  );
};

export const runSingleScrape = async (place: PlaceConfig): Promise<ScrapeResult> => {
  const env = loadEnv();
  const runtime = loadRuntimeConfigFromEnv();

  return withScrapeResources(env, "flat", runtime.navigationTimeoutMs, (browser, sink) =>
    scrapeOnePlace({ browser, sink, config: runtime.scraperConfig }, place)
  );
};

export const runMergeExports = async (options: MergeOptions): Promise<MergeSummary> => {
  const env = loadEnv();
  return mergeExports(
    { source: new PlaceExportReader(env.OUTPUT_DIR), sink: new MergedExportWriter(env.OUTPUT_DIR) },
    options
  );
};
