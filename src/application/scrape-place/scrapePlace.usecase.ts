import type { Coordinates, PlaceConfig } from "../../core/places/place.types";
import {
  emptyScrapeStats,
  type LoaderTerminal,
  type ScrapeResult,
  type ScrapeStats,
  type ScrapeStatus
} from "../../core/scrape/ScrapeResult";
import type { ContentSource, PlaceBrowser } from "../../ports/ContentSource";
import { createScrapeStatsTracker, describeError, toErrorMessage } from "./scrape.error-handler";
import { resolveScraperConfig, type ScraperConfigInput } from "./scraper.config";
import { runScrollLoader } from "./scrollLoader";

export type ScrapePlaceDeps = {
  browser: PlaceBrowser;
  config: ScraperConfigInput;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  randomFn?: () => number;
};

const terminalMessages: Record<Exclude<LoaderTerminal, "exhausted">, string> = {
  max_retries_exceeded: "Stopped after exceeding the backoff retry limit",
  deadline_exceeded: "Stopped at the per-place time limit"
};

export const deriveScrapeStatus = (
  terminal: LoaderTerminal,
  reviewCount: number,
  coordinates: Coordinates | null
): { status: ScrapeStatus; error?: string } => {
  if (terminal === "exhausted") {
    return coordinates
      ? { status: "success" }
      : { status: "partial_success", error: "Coordinates unavailable" };
  }

  return reviewCount > 0
    ? { status: "partial_success", error: terminalMessages[terminal] }
    : { status: "failed", error: terminalMessages[terminal] };
};

export const failedScrapeResult = (
  place: PlaceConfig,
  reason: unknown,
  scrapedAt: Date,
  extras: { coordinates?: Coordinates | null; stats?: ScrapeStats } = {}
): ScrapeResult => ({
  location: place.name,
  outputName: place.outputName,
  scrapedAt,
  coordinates: extras.coordinates ?? null,
  reviews: [],
  status: "failed",
  error: describeError(reason),
  stats: extras.stats ?? emptyScrapeStats()
});

const resolveCoordinates = async (source: ContentSource, place: PlaceConfig): Promise<Coordinates | null> => {
  try {
    const coordinates = await source.resolveCoordinates();
    if (!coordinates) {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({ event: "scrape.coordinates_missing", outputName: place.outputName }));
    }
    return coordinates;
  } catch (err) {
    // eslint-disable-next-line no-console
    console.warn(JSON.stringify({
      event: "scrape.coordinates_missing",
      outputName: place.outputName,
      reason: toErrorMessage(err)
    }));
    return null;
  }
};

/**
 * Scrapes one place: open page, locate the review panel, resolve coordinates,
 * drain the panel. Errors after the page is open end as a `failed` result;
 * a failure to open the page propagates. The page is closed on every path.
 */
export const scrapePlace = async (deps: ScrapePlaceDeps, place: PlaceConfig): Promise<ScrapeResult> => {
  const config = resolveScraperConfig(deps.config);
  const now = deps.now ?? Date.now;
  const tracker = createScrapeStatsTracker();
  const startedAt = now();

  console.log(JSON.stringify({ event: "scrape.place_started", outputName: place.outputName, location: place.name }));

  const source = await deps.browser.open(place.url);
  let coordinates: Coordinates | null = null;

  try {
    const panel = await source.locatePanel();
    coordinates = await resolveCoordinates(source, place);

    const loaded = await runScrollLoader({
      source,
      panel,
      outputName: place.outputName,
      config,
      tracker,
      deadlineAt: startedAt + config.placeTimeoutMs,
      now,
      sleep: deps.sleep,
      randomFn: deps.randomFn
    });

    const { status, error } = deriveScrapeStatus(loaded.terminal, loaded.records.length, coordinates);
    const result: ScrapeResult = {
      location: place.name,
      outputName: place.outputName,
      scrapedAt: new Date(now()),
      coordinates,
      reviews: status === "failed" ? [] : loaded.records,
      status,
      ...(error ? { error } : {}),
      stats: tracker.stats()
    };

    console.log(JSON.stringify({
      event: "scrape.place_completed",
      outputName: place.outputName,
      status,
      reviews: result.reviews.length,
      durationMs: now() - startedAt,
      ...result.stats
    }));
    return result;
  } catch (err) {
    const result = failedScrapeResult(place, err, new Date(now()), { coordinates, stats: tracker.stats() });
    // eslint-disable-next-line no-console
    console.warn(JSON.stringify({ event: "scrape.place_failed", outputName: place.outputName, error: result.error }));
    return result;
  } finally {
    await source.close().catch((err: unknown) => {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({
        event: "scrape.page_close_failed",
        outputName: place.outputName,
        reason: toErrorMessage(err)
      }));
    });
  }
};
