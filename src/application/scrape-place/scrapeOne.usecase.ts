import type { PlaceConfig } from "../../core/places/place.types";
import type { ScrapeResult } from "../../core/scrape/ScrapeResult";
import type { PlaceBrowser } from "../../ports/ContentSource";
import type { ResultSink } from "../../ports/ResultSink";
import { wrapSinkFailure } from "./scrape.error-handler";
import { scrapePlace } from "./scrapePlace.usecase";
import type { ScraperConfigInput } from "./scraper.config";

/**
 * Same pipeline as a batch entry for a single place. The export is the only
 * output of the run, so failing to write it is fatal.
 */
export const scrapeOnePlace = async (
  deps: { browser: PlaceBrowser; sink: ResultSink; config: ScraperConfigInput },
  place: PlaceConfig
): Promise<ScrapeResult> => {
  const result = await scrapePlace({ browser: deps.browser, config: deps.config }, place);

  try {
    await deps.sink.writePlaceResult(place, result);
  } catch (err) {
    throw wrapSinkFailure(err, { target: "place", outputName: place.outputName });
  }

  return result;
};
