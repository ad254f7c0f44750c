export class InvalidExportError extends Error {
  readonly code = "export_invalid";
  readonly context: { sourceFile: string };

  constructor(message: string, context: { sourceFile: string }) {
    super(message);
    this.name = "InvalidExportError";
    this.context = context;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** One review of the combined dataset, tagged with the export it came from. */
export type CombinedReviewRow = {
  name: string;
  comment: string;
  rating: number | null;
  date: string;
  latitude: number | null;
  longitude: number | null;
  sourceLocation: string;   // per-place folder name
  sourceFile: string;
};

export type ExportOrigin = { sourceLocation: string; sourceFile: string };

export type ReviewGroup = {
  groupId: number;
  representativeComment: string;
  sampleName: string;
  occurrences: number;
  locationsMerged: string[];
  averageRating: number | null;
  ratings: number[];
  members: CombinedReviewRow[];
};

export const DEFAULT_GROUP_THRESHOLD = 0.85;

// Exports written by other tools name their columns differently.
const FIELD_ALIASES = {
  name: ["name", "reviewer", "author", "reviewername"],
  comment: ["comment", "review", "text"],
  rating: ["rating", "stars"],
  date: ["date", "time"],
  latitude: ["latitude", "lat"],
  longitude: ["longitude", "lon", "lng"]
} as const;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const fieldReader = (item: Record<string, unknown>) => {
  const keys = new Map(Object.keys(item).map((key) => [key.toLowerCase(), key]));
  return (aliases: readonly string[]): unknown => {
    for (const alias of aliases) {
      const key = keys.get(alias);
      if (key !== undefined) return item[key];
    }
    return undefined;
  };
};

const asText = (value: unknown): string => {
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return "";
};

const toNumber = (value: unknown): number | null => {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string" || value.trim() === "") return null;
  const parsed = Number(value.trim());
  return Number.isFinite(parsed) ? parsed : null;
};

/** 4, "4" and "4 stars" all read as 4; anything else is null. */
export const toRating = (value: unknown): number | null => {
  const whole = toNumber(value);
  if (whole != null || typeof value !== "string") return whole;
  return toNumber(value.trim().split(/\s+/)[0]);
};

export const normalizeCommentText = (value: string): string =>
  value
    .toLowerCase()
    .replace(/\s+/g, " ")
    .replace(/[^0-9a-z\s]/g, "")
    .trim();

/**
 * Accepts a place export (`{ location, coordinates, reviews: [...] }`) or a
 * bare array of review objects. Review-level coordinates win over the
 * export's own; entries that are not objects are dropped.
 */
export const rowsFromExportPayload = (payload: unknown, origin: ExportOrigin): CombinedReviewRow[] => {
  const items: unknown[] | undefined = Array.isArray(payload)
    ? payload
    : isRecord(payload) && Array.isArray(payload.reviews)
      ? payload.reviews
      : undefined;
  if (items === undefined) {
    throw new InvalidExportError(`${origin.sourceFile} holds neither a reviews list nor an array`, {
      sourceFile: origin.sourceFile
    });
  }

  const fallback: Record<string, unknown> = isRecord(payload) && isRecord(payload.coordinates) ? payload.coordinates : {};

  return items.filter(isRecord).map((item) => {
    const read = fieldReader(item);
    return {
      name: asText(read(FIELD_ALIASES.name)).trim(),
      comment: asText(read(FIELD_ALIASES.comment)),
      rating: toRating(read(FIELD_ALIASES.rating)),
      date: asText(read(FIELD_ALIASES.date)),
      latitude: toNumber(read(FIELD_ALIASES.latitude) ?? fallback.latitude),
      longitude: toNumber(read(FIELD_ALIASES.longitude) ?? fallback.longitude),
      sourceLocation: origin.sourceLocation,
      sourceFile: origin.sourceFile
    };
  });
};

export const exactDuplicateKey = (row: CombinedReviewRow): string =>
  `${row.name.trim().toLowerCase()}|${normalizeCommentText(row.comment)}|${row.date}`;

/** Keeps the first row of each exact-duplicate key, in input order. */
export const dropExactDuplicates = (
  rows: readonly CombinedReviewRow[]
): { rows: CombinedReviewRow[]; removed: number } => {
  const seen = new Set<string>();
  const kept: CombinedReviewRow[] = [];
  for (const row of rows) {
    const key = exactDuplicateKey(row);
    if (seen.has(key)) continue;
    seen.add(key);
    kept.push(row);
  }
  return { rows: kept, removed: rows.length - kept.length };
};

const bigrams = (value: string): Map<string, number> => {
  const counts = new Map<string, number>();
  for (let i = 0; i < value.length - 1; i += 1) {
    const pair = value.slice(i, i + 2);
    counts.set(pair, (counts.get(pair) ?? 0) + 1);
  }
  return counts;
};

/** Dice coefficient over character bigrams, in [0, 1]. */
export const textSimilarity = (a: string, b: string): number => {
  if (a === b) return 1;
  if (a.length < 2 || b.length < 2) return 0;

  const left = bigrams(a);
  const right = bigrams(b);
  let shared = 0;
  for (const [pair, count] of left) {
    shared += Math.min(count, right.get(pair) ?? 0);
  }
  return (2 * shared) / (a.length - 1 + (b.length - 1));
};

const mean = (values: readonly number[]): number | null =>
  values.length > 0 ? values.reduce((sum, value) => sum + value, 0) / values.length : null;

/**
 * Greedy single pass: a row joins the first group whose representative (the
 * longest normalized comment seen so far) is similar enough, otherwise it
 * opens a new group. Rows without comment text never join a group.
 */
export const groupSimilarReviews = (
  rows: readonly CombinedReviewRow[],
  threshold = DEFAULT_GROUP_THRESHOLD
): ReviewGroup[] => {
  const buckets: Array<{ representative: string; members: CombinedReviewRow[] }> = [];

  for (const row of rows) {
    const normalized = normalizeCommentText(row.comment);
    const bucket = buckets.find(
      (candidate) => candidate.representative !== "" && textSimilarity(candidate.representative, normalized) >= threshold
    );
    if (bucket) {
      bucket.members.push(row);
      if (normalized.length > bucket.representative.length) bucket.representative = normalized;
    } else {
      buckets.push({ representative: normalized, members: [row] });
    }
  }

  return buckets.map(({ members }, index) => {
    const ratings = members.flatMap((member) => (member.rating == null ? [] : [member.rating]));
    return {
      groupId: index + 1,
      representativeComment: members.reduce(
        (longest, member) => (member.comment.length > longest.length ? member.comment : longest),
        ""
      ),
      sampleName: members[0]?.name ?? "",
      occurrences: members.length,
      locationsMerged: [...new Set(members.map((member) => member.sourceLocation).filter((l) => l !== ""))].sort(),
      averageRating: mean(ratings),
      ratings,
      members
    };
  });
};

/** Mean of the known ratings, rounded to three decimals. */
export const averageRowRating = (rows: readonly CombinedReviewRow[]): number | null => {
  const value = mean(rows.flatMap((row) => (row.rating == null ? [] : [row.rating])));
  return value == null ? null : Math.round(value * 1000) / 1000;
};
