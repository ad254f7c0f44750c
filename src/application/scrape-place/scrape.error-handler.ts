import { InvalidReviewError } from "../../core/reviews/extractReview";
import type { LoaderTerminal, ScrapeStats } from "../../core/scrape/ScrapeResult";

export type ScrapeSkipCode = "invalid_review" | "extraction_unexpected";
export type ScrapeFailureCode = "sink_write_failed";

export type SinkWriteContext = {
  target: "place" | "summary";
  outputName?: string;
};

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

/** Human-readable one-liner kept in summaries, e.g. "PanelNotFoundError: Review panel not found on page". */
export const describeError = (reason: unknown): string => {
  if (reason instanceof Error) return `${reason.name || "Error"}: ${reason.message}`;
  return String(reason);
};

export class SinkWriteError extends Error {
  readonly code: ScrapeFailureCode = "sink_write_failed";
  readonly context: SinkWriteContext;
  readonly cause?: unknown;

  constructor(args: { message: string; context: SinkWriteContext; cause?: unknown }) {
    super(args.message);
    this.name = "SinkWriteError";
    this.context = args.context;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

type ReviewSkippedLog = {
  event: "scrape.item_skipped";
  code: ScrapeSkipCode;
  reason: string;
  outputName: string;
  pass: number;
  index: number;
};

export const classifyExtractionFailure = (
  reason: unknown,
  context: { outputName: string; pass: number; index: number }
): { code: ScrapeSkipCode; log: ReviewSkippedLog } => {
  const code: ScrapeSkipCode = reason instanceof InvalidReviewError ? "invalid_review" : "extraction_unexpected";
  return {
    code,
    log: {
      event: "scrape.item_skipped",
      code,
      reason: toErrorMessage(reason),
      outputName: context.outputName,
      pass: context.pass,
      index: context.index
    }
  };
};

export const wrapSinkFailure = (reason: unknown, context: SinkWriteContext): SinkWriteError => {
  const where = context.target === "summary" ? "batch summary" : `place "${context.outputName ?? "?"}"`;
  const message = `Failed to write ${where}: ${toErrorMessage(reason)}`;
  const cause = reason instanceof Error ? reason.cause ?? reason : reason;
  return new SinkWriteError({ message, context, cause });
};

export const createScrapeStatsTracker = () => {
  let passes = 0;
  let duplicates = 0;
  let backoffs = 0;
  let terminal: LoaderTerminal | undefined;
  const skippedByCode: Partial<Record<ScrapeSkipCode, number>> = {};

  return {
    passes: () => passes,
    nextPassNumber: () => passes + 1,
    addPass: () => {
      passes += 1;
    },
    addDuplicates: (count: number) => {
      duplicates += count;
    },
    addBackoff: () => {
      backoffs += 1;
    },
    addSkipped: (code: ScrapeSkipCode) => {
      skippedByCode[code] = (skippedByCode[code] ?? 0) + 1;
      return skippedByCode[code] ?? 0;
    },
    setTerminal: (value: LoaderTerminal) => {
      terminal = value;
    },
    stats: (): ScrapeStats => ({
      passes,
      droppedItems: (skippedByCode.invalid_review ?? 0) + (skippedByCode.extraction_unexpected ?? 0),
      duplicates,
      backoffs,
      ...(terminal ? { terminal } : {})
    })
  };
};

export type ScrapeStatsTracker = ReturnType<typeof createScrapeStatsTracker>;
