import type { MergeOptions } from "../application/merge-exports/mergeExports.usecase";
import { runMergeExports } from "../composition/root";
import { DEFAULT_GROUP_THRESHOLD } from "../core/merge/mergeReviews";
import { reportCliFailure } from "./errorEnvelope";

const USAGE = "Usage: merge-reviews [--group] [--threshold <0..1>]";

export const parseMergeArgs = (argv: readonly string[]): MergeOptions => {
  let group = false;
  let threshold = DEFAULT_GROUP_THRESHOLD;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "--group") {
      group = true;
    } else if (arg === "--threshold") {
      const raw = argv[i + 1];
      if (raw == null || raw.startsWith("--")) {
        throw new Error(`--threshold expects a value. ${USAGE}`);
      }
      const value = Number(raw);
      if (raw.trim() === "" || !Number.isFinite(value) || value < 0 || value > 1) {
        throw new Error(`--threshold must be a number between 0 and 1. Received: ${raw}`);
      }
      threshold = value;
      i += 1;
    } else {
      throw new Error(`Unknown option ${arg}. ${USAGE}`);
    }
  }

  return { group, threshold };
};

/** Combines the per-place exports under OUTPUT_DIR. Exits 1 on bad arguments or a failed write. */
export const executeMergeCli = async (argv: readonly string[] = process.argv.slice(2)): Promise<void> => {
  try {
    await runMergeExports(parseMergeArgs(argv));
  } catch (err) {
    reportCliFailure(err, "merge.failed");
  }
};

if (require.main === module) {
  void executeMergeCli();
}
