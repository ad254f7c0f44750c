type ErrorContext = Partial<{
  index: number;
  outputName: string;
  target: string;
}>;

export type CliFailureEvent = "scrape.failed" | "merge.failed";

export type CliErrorEnvelope = {
  event: CliFailureEvent;
  name: string;
  message: string;
  code?: string;
  context?: ErrorContext;
  stack?: string;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const extractContext = (value: unknown): ErrorContext | undefined => {
  if (!isRecord(value)) return undefined;

  const sanitizedContext: ErrorContext = {};
  if (typeof value.index === "number" && Number.isFinite(value.index)) {
    sanitizedContext.index = value.index;
  }
  if (typeof value.outputName === "string") {
    sanitizedContext.outputName = value.outputName;
  }
  if (typeof value.target === "string") {
    sanitizedContext.target = value.target;
  }

  return Object.keys(sanitizedContext).length > 0 ? sanitizedContext : undefined;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

export const buildCliErrorEnvelope = (
  err: unknown,
  includeStack: boolean,
  event: CliFailureEvent = "scrape.failed"
): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorRecord = isRecord(err) ? err : {};

  const envelope: CliErrorEnvelope = {
    event,
    name: error.name || "Error",
    message: error.message
  };

  if (typeof errorRecord.code === "string") {
    envelope.code = errorRecord.code;
  }

  const context = extractContext(errorRecord.context);
  if (context) {
    envelope.context = context;
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

export const reportCliFailure = (err: unknown, event: CliFailureEvent = "scrape.failed"): never => {
  const envelope = buildCliErrorEnvelope(err, isDebugMode(), event);
  // eslint-disable-next-line no-console
  console.error(JSON.stringify(envelope));
  return process.exit(1);
};
