import { promises as fs } from "fs";
import { ConfigError, parsePlaceConfigs } from "../../core/places/placeConfig";
import type { PlaceConfig } from "../../core/places/place.types";
import type { PlaceConfigStore } from "../../ports/PlaceConfigStore";

const toErrorMessage = (reason: unknown): string => (reason instanceof Error ? reason.message : String(reason));

/** Reads `{ "locations": [{ "name", "url", "output_name" }] }` from disk. */
export class LocationsFileStore implements PlaceConfigStore {
  constructor(private readonly filePath: string) {}

  async loadPlaces(): Promise<PlaceConfig[]> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, "utf8");
    } catch (err) {
      throw new ConfigError(`Cannot read place configuration ${this.filePath}: ${toErrorMessage(err)}`);
    }

    let document: unknown;
    try {
      document = JSON.parse(text);
    } catch (err) {
      throw new ConfigError(`Invalid JSON in ${this.filePath}: ${toErrorMessage(err)}`);
    }

    return parsePlaceConfigs(document);
  }
}
