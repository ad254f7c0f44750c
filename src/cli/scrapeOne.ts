import { runSingleScrape } from "../composition/root";
import { parsePlaceConfig, placeNameFromUrl } from "../core/places/placeConfig";
import type { PlaceConfig } from "../core/places/place.types";
import { reportCliFailure } from "./errorEnvelope";

const USAGE = "Usage: scrape-one <place-url> [--name <name>] [--output <output-name>]";

/** `<url> [--name <name>] [--output <output-name>]` -> validated PlaceConfig */
export const parseScrapeOneArgs = (argv: readonly string[]): PlaceConfig => {
  const positional: string[] = [];
  const flags: Record<string, string> = {};

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "--name" || arg === "--output") {
      const value = argv[i + 1];
      if (value == null || value.startsWith("--")) {
        throw new Error(`${arg} expects a value. ${USAGE}`);
      }
      flags[arg] = value;
      i += 1;
    } else if (arg.startsWith("--")) {
      throw new Error(`Unknown option ${arg}. ${USAGE}`);
    } else {
      positional.push(arg);
    }
  }

  if (positional.length !== 1) {
    throw new Error(USAGE);
  }

  const url = positional[0];
  const name = flags["--name"] ?? placeNameFromUrl(url) ?? "OneLocation";
  return parsePlaceConfig({ name, url, output_name: flags["--output"] }, 0);
};

export const executeScrapeOneCli = async (argv: readonly string[] = process.argv.slice(2)): Promise<void> => {
  try {
    await runSingleScrape(parseScrapeOneArgs(argv));
  } catch (err) {
    reportCliFailure(err);
  }
};

if (require.main === module) {
  void executeScrapeOneCli();
}
