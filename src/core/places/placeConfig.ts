import type { PlaceConfig } from "./place.types";

export class ConfigError extends Error {
  readonly code = "config_invalid";
  readonly context: { index?: number; outputName?: string };

  constructor(message: string, context: { index?: number; outputName?: string } = {}) {
    super(message);
    this.name = "ConfigError";
    this.context = context;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const deriveOutputName = (name: string): string => name.replace(/[^A-Za-z0-9]/g, "");

/** ".../maps/place/Blue+Bottle+Coffee/@..." -> "Blue Bottle Coffee" */
export const placeNameFromUrl = (url: string): string | undefined => {
  const match = /\/place\/([^/@?]+)/.exec(url);
  if (!match) return undefined;
  try {
    return decodeURIComponent(match[1].replace(/\+/g, " ")).trim() || undefined;
  } catch {
    return match[1].replace(/\+/g, " ").trim() || undefined;
  }
};

const isHttpUrl = (value: string): boolean => {
  try {
    const parsed = new URL(value);
    return parsed.protocol === "http:" || parsed.protocol === "https:";
  } catch {
    return false;
  }
};

const requireString = (entry: Record<string, unknown>, key: string, index: number): string => {
  const value = entry[key];
  if (typeof value !== "string" || value.trim() === "") {
    throw new ConfigError(`locations[${index}] is missing "${key}"`, { index });
  }
  return value.trim();
};

export const parsePlaceConfig = (entry: unknown, index: number): PlaceConfig => {
  if (!isRecord(entry)) {
    throw new ConfigError(`locations[${index}] must be an object`, { index });
  }

  const name = requireString(entry, "name", index);
  const url = requireString(entry, "url", index);
  if (!isHttpUrl(url)) {
    throw new ConfigError(`locations[${index}].url must be an absolute http/https URL. Received: ${url}`, { index });
  }

  const explicitOutputName = entry.output_name;
  let outputName: string;
  if (explicitOutputName == null) {
    outputName = deriveOutputName(name);
  } else if (typeof explicitOutputName === "string") {
    outputName = explicitOutputName.trim() || deriveOutputName(name);
  } else {
    throw new ConfigError(`locations[${index}].output_name must be a string`, { index });
  }
  if (!/^[A-Za-z0-9_-]+$/.test(outputName)) {
    throw new ConfigError(
      `locations[${index}].output_name must contain only letters, digits, "_" or "-". Received: ${outputName}`,
      { index, outputName }
    );
  }

  return Object.freeze({ name, url, outputName });
};

/**
 * Two places sharing an output name would overwrite each other's export.
 * Names are compared case-insensitively: "Cafe" and "cafe" are the same
 * folder on macOS and Windows.
 */
export const assertUniqueOutputNames = (places: readonly PlaceConfig[]): void => {
  const seen = new Map<string, { index: number; outputName: string }>();
  places.forEach((place, index) => {
    const key = place.outputName.toLowerCase();
    const first = seen.get(key);
    if (first != null) {
      const names = first.outputName === place.outputName
        ? `"${place.outputName}"`
        : `"${first.outputName}" / "${place.outputName}"`;
      throw new ConfigError(
        `Duplicate output name ${names} at locations[${first.index}] and locations[${index}]`,
        { index, outputName: place.outputName }
      );
    }
    seen.set(key, { index, outputName: place.outputName });
  });
};

/**
 * Validates the `{ "locations": [...] }` document. Any malformed entry rejects
 * the whole list.
 */
export const parsePlaceConfigs = (document: unknown): PlaceConfig[] => {
  if (!isRecord(document) || !Array.isArray(document.locations)) {
    throw new ConfigError('Place configuration must be an object with a "locations" array');
  }
  if (document.locations.length === 0) {
    throw new ConfigError("No locations configured");
  }

  const places = document.locations.map((entry: unknown, index: number) => parsePlaceConfig(entry, index));
  assertUniqueOutputNames(places);
  return places;
};
