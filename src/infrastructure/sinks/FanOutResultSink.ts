import type { PlaceConfig } from "../../core/places/place.types";
import type { BatchSummary, ScrapeResult } from "../../core/scrape/ScrapeResult";
import type { ResultSink } from "../../ports/ResultSink";

const toErrorMessage = (reason: unknown): string => (reason instanceof Error ? reason.message : String(reason));

/**
 * The primary sink decides the outcome of a write: its failure propagates.
 * Secondary sinks (the optional database store) run after it and are
 * best-effort; their failures are logged as `store.write_failed`.
 */
export class FanOutResultSink implements ResultSink {
  constructor(
    private readonly primary: ResultSink,
    private readonly secondaries: readonly ResultSink[] = []
  ) {}

  async writePlaceResult(place: PlaceConfig, result: ScrapeResult): Promise<void> {
    await this.primary.writePlaceResult(place, result);
    for (const sink of this.secondaries) {
      try {
        await sink.writePlaceResult(place, result);
      } catch (err) {
        this.logSecondaryFailure("place", err, place.outputName);
      }
    }
  }

  async writeSummary(summary: BatchSummary): Promise<void> {
    await this.primary.writeSummary(summary);
    for (const sink of this.secondaries) {
      try {
        await sink.writeSummary(summary);
      } catch (err) {
        this.logSecondaryFailure("summary", err);
      }
    }
  }

  private logSecondaryFailure(target: "place" | "summary", reason: unknown, outputName?: string): void {
    // eslint-disable-next-line no-console
    console.warn(JSON.stringify({
      event: "store.write_failed",
      target,
      ...(outputName ? { outputName } : {}),
      reason: toErrorMessage(reason)
    }));
  }
}
