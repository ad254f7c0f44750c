import type { ReviewSortOrder } from "../../ports/ContentSource";

export type Env = {
  LOCATIONS_FILE: string;
  OUTPUT_DIR: string;
  CHROME_EXECUTABLE_PATH: string;
  HEADLESS: boolean;
  REVIEW_SORT: ReviewSortOrder;
  MONGO_URI?: string;
};

const validateMongoUri = (value: string): string => {
  if (!/^mongodb(\+srv)?:\/\//.test(value)) {
    throw new Error(`MONGO_URI must start with mongodb:// or mongodb+srv://. Received: ${value}`);
  }
  return value;
};

const parseBoolean = (name: string, raw: string | undefined, fallback: boolean): boolean => {
  if (raw == null || raw.trim() === "") return fallback;
  const normalized = raw.trim().toLowerCase();
  if (normalized === "1" || normalized === "true") return true;
  if (normalized === "0" || normalized === "false") return false;
  throw new Error(`${name} must be one of 1, 0, true, false. Received: ${raw}`);
};

const parseReviewSort = (raw: string | undefined): ReviewSortOrder => {
  const normalized = raw?.trim().toLowerCase() ?? "";
  if (normalized === "" || normalized === "relevant") return "relevant";
  if (normalized === "newest") return "newest";
  throw new Error(`REVIEW_SORT must be one of relevant, newest. Received: ${raw ?? ""}`);
};

const nonEmpty = (raw: string | undefined): string | undefined => (raw?.trim() ? raw.trim() : undefined);

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const LOCATIONS_FILE = nonEmpty(env.LOCATIONS_FILE) ?? "locations.json";
  const OUTPUT_DIR = nonEmpty(env.OUTPUT_DIR) ?? "output";
  const CHROME_EXECUTABLE_PATH = nonEmpty(env.CHROME_EXECUTABLE_PATH) ?? "";
  const HEADLESS = parseBoolean("HEADLESS", env.HEADLESS, true);
  const REVIEW_SORT = parseReviewSort(env.REVIEW_SORT);
  const mongoUri = nonEmpty(env.MONGO_URI);

  return {
    LOCATIONS_FILE,
    OUTPUT_DIR,
    CHROME_EXECUTABLE_PATH,
    HEADLESS,
    REVIEW_SORT,
    ...(mongoUri ? { MONGO_URI: validateMongoUri(mongoUri) } : {})
  };
};
