import { dedupeReviews } from "../../core/reviews/dedupeReviews";
import type { ReviewRecord } from "../../core/reviews/review.types";
import type { LoaderTerminal } from "../../core/scrape/ScrapeResult";
import {
  ThrottleSignalError,
  type ContentSource,
  type LoadBatch,
  type PanelHandle
} from "../../ports/ContentSource";
import { computeBackoffDelay, sleep, type BackoffPolicy } from "../../shared/retry/retry";
import { extractReviews } from "./extractReviews";
import { createScrapeStatsTracker, toErrorMessage, type ScrapeStatsTracker } from "./scrape.error-handler";
import type { ScraperConfig } from "./scraper.config";

export type ScrollLoaderDeps = {
  source: ContentSource;
  panel: PanelHandle;
  outputName: string;
  config: ScraperConfig;
  tracker?: ScrapeStatsTracker;
  deadlineAt?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  randomFn?: () => number;
};

export type ScrollLoadResult = {
  records: ReviewRecord[];
  terminal: LoaderTerminal;
  backoffDelays: number[];
};

type PassOutcome =
  | { kind: "loaded"; batch: LoadBatch }
  | { kind: "throttled"; reason: string };

/**
 * Drives `loadMore` until the list stops yielding new reviews.
 *
 * loading -> loading               new unique records in the pass
 * loading -> exhausted             maxStagnantPasses passes in a row without new records, or hasMore=false
 * loading -> backoff -> loading    throttle signal; retry counter resets after the next good pass
 * backoff -> max_retries_exceeded  retry counter above maxBackoffRetries
 * any     -> deadline_exceeded     place deadline reached before a pass or a backoff sleep
 *
 * A pass counts as throttled when the source throws ThrottleSignalError, flags
 * `throttled`, or fails in any other way once records have been collected.
 * Failures before the first record propagate to the caller.
 */
export const runScrollLoader = async (deps: ScrollLoaderDeps): Promise<ScrollLoadResult> => {
  const { source, panel, outputName, config } = deps;
  const now = deps.now ?? Date.now;
  const wait = deps.sleep ?? sleep;
  const tracker = deps.tracker ?? createScrapeStatsTracker();
  const deadlineAt = deps.deadlineAt ?? now() + config.placeTimeoutMs;
  const policy: BackoffPolicy = {
    baseDelayMs: config.backoffBaseMs,
    maxDelayMs: config.backoffMaxMs,
    jitterRatio: config.backoffJitterRatio,
    randomFn: deps.randomFn
  };

  const records: ReviewRecord[] = [];
  const backoffDelays: number[] = [];
  let keys: ReadonlySet<string> = new Set<string>();
  let stagnantPasses = 0;
  let retries = 0;

  const finish = (terminal: LoaderTerminal): ScrollLoadResult => {
    tracker.setTerminal(terminal);
    return { records, terminal, backoffDelays };
  };

  const loadPass = async (): Promise<PassOutcome> => {
    try {
      const batch = await source.loadMore(panel, { timeoutMs: config.passTimeoutMs });
      if (batch.throttled) return { kind: "throttled", reason: "source reported throttling" };
      return { kind: "loaded", batch };
    } catch (err) {
      if (err instanceof ThrottleSignalError) return { kind: "throttled", reason: err.message };
      // An error in a stream that already produced content is treated as rate limiting.
      if (records.length > 0) return { kind: "throttled", reason: toErrorMessage(err) };
      throw err;
    }
  };

  while (true) {
    if (now() >= deadlineAt) return finish("deadline_exceeded");

    const outcome = await loadPass();

    if (outcome.kind === "throttled") {
      retries += 1;
      if (retries > config.maxBackoffRetries) {
        // eslint-disable-next-line no-console
        console.warn(JSON.stringify({
          event: "scrape.backoff_exhausted",
          outputName,
          retries: retries - 1,
          maxRetries: config.maxBackoffRetries,
          collected: records.length
        }));
        return finish("max_retries_exceeded");
      }

      const delayMs = computeBackoffDelay(retries - 1, policy);
      if (now() + delayMs >= deadlineAt) return finish("deadline_exceeded");

      tracker.addBackoff();
      backoffDelays.push(delayMs);
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({
        event: "scrape.backoff",
        outputName,
        retry: retries,
        maxRetries: config.maxBackoffRetries,
        delayMs,
        reason: outcome.reason
      }));
      await wait(delayMs);
      continue;
    }

    retries = 0;
    const pass = tracker.nextPassNumber();
    tracker.addPass();

    const { batch } = outcome;
    const { records: extracted } = extractReviews(batch.rawItems, { outputName, pass, tracker });
    const deduped = dedupeReviews(keys, extracted);
    keys = deduped.keys;
    records.push(...deduped.newRecords);
    tracker.addDuplicates(deduped.duplicates);
    stagnantPasses = deduped.newRecords.length === 0 ? stagnantPasses + 1 : 0;

    console.log(JSON.stringify({
      event: "scrape.pass",
      outputName,
      pass,
      rawItems: batch.rawItems.length,
      newRecords: deduped.newRecords.length,
      totalRecords: records.length,
      stagnantPasses
    }));

    if (!batch.hasMore || stagnantPasses >= config.maxStagnantPasses) return finish("exhausted");
  }
};
