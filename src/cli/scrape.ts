import { runBatchScrape } from "../composition/root";
import { reportCliFailure } from "./errorEnvelope";

/**
 * Batch mode. Exits 0 once the summary is written, whatever the per-place
 * outcome; exits 1 when the configuration or the summary cannot be handled.
 */
export const executeScrapeCli = async (): Promise<void> => {
  try {
    await runBatchScrape();
  } catch (err) {
    reportCliFailure(err);
  }
};

if (require.main === module) {
  void executeScrapeCli();
}
