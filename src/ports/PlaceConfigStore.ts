import type { PlaceConfig } from "../core/places/place.types";

export interface PlaceConfigStore {
  /** Rejects with ConfigError when the list is unreadable or malformed. */
  loadPlaces(): Promise<PlaceConfig[]>;
}
