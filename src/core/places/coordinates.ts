import type { Coordinates } from "./place.types";

// !3d<lat>!4d<lon> marks the place itself; @<lat>,<lon> is only the map viewport.
const PLACE_MARKER_PATTERN = /!3d(-?\d+(?:\.\d+)?)!4d(-?\d+(?:\.\d+)?)/;
const VIEWPORT_PATTERN = /@(-?\d+(?:\.\d+)?),(-?\d+(?:\.\d+)?)/;

export type CoordinatesSource = "place_marker" | "viewport";

export const toCoordinates = (latitude: number, longitude: number): Coordinates | null => {
  if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) return null;
  if (Math.abs(latitude) > 90 || Math.abs(longitude) > 180) return null;
  return Object.freeze({ latitude, longitude });
};

export const coordinatesFromUrl = (url: string): { coordinates: Coordinates; source: CoordinatesSource } | null => {
  const marker = PLACE_MARKER_PATTERN.exec(url);
  if (marker) {
    const coordinates = toCoordinates(Number(marker[1]), Number(marker[2]));
    if (coordinates) return { coordinates, source: "place_marker" };
  }

  const viewport = VIEWPORT_PATTERN.exec(url);
  if (viewport) {
    const coordinates = toCoordinates(Number(viewport[1]), Number(viewport[2]));
    if (coordinates) return { coordinates, source: "viewport" };
  }

  return null;
};
