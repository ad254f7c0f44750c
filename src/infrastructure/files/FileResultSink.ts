import { promises as fs } from "fs";
import path from "path";
import type { PlaceConfig } from "../../core/places/place.types";
import type { BatchSummary, ScrapeResult } from "../../core/scrape/ScrapeResult";
import type { ResultSink } from "../../ports/ResultSink";
import { writeJson, writeWorkbook, type SheetColumn } from "./fileWriters";

/**
 * `per_place`: <outputDir>/locations/<outputName>/<outputName>.{json,xlsx}
 * `flat`:      <outputDir>/<outputName>.{json,xlsx}
 */
export type OutputLayout = "per_place" | "flat";

export type PlaceExport = {
  location: string;
  scrapedAt: string;
  coordinates: { latitude: number; longitude: number } | null;
  totalReviews: number;
  reviews: Array<{ name: string; rating: number; date: string; comment: string }>;
};

export type SummaryExport = {
  generatedAt: string;
  totals: BatchSummary["totals"];
  entries: Array<{
    outputName: string;
    location: string;
    reviewCount: number;
    averageRating: number | null;
    status: string;
    error: string | null;
    latitude: number | null;
    longitude: number | null;
  }>;
};

const REVIEW_COLUMNS: SheetColumn[] = [
  { header: "name", key: "name", width: 28 },
  { header: "comment", key: "comment", width: 80 },
  { header: "rating", key: "rating", width: 8 },
  { header: "date", key: "date", width: 16 },
  { header: "latitude", key: "latitude", width: 12 },
  { header: "longitude", key: "longitude", width: 12 }
];

const SUMMARY_COLUMNS: SheetColumn[] = [
  { header: "Output Name", key: "outputName", width: 24 },
  { header: "Location", key: "location", width: 32 },
  { header: "Reviews", key: "reviewCount", width: 10 },
  { header: "Avg Rating", key: "averageRating", width: 12 },
  { header: "Status", key: "status", width: 16 },
  { header: "Error", key: "error", width: 48 },
  { header: "Latitude", key: "latitude", width: 12 },
  { header: "Longitude", key: "longitude", width: 12 }
];

export const toPlaceExport = (result: ScrapeResult): PlaceExport => ({
  location: result.location,
  scrapedAt: result.scrapedAt.toISOString(),
  coordinates: result.coordinates
    ? { latitude: result.coordinates.latitude, longitude: result.coordinates.longitude }
    : null,
  totalReviews: result.reviews.length,
  reviews: result.reviews.map((review) => ({
    name: review.reviewerName,
    rating: review.rating,
    date: review.date,
    comment: review.comment
  }))
});

export const toSummaryExport = (summary: BatchSummary): SummaryExport => ({
  generatedAt: summary.generatedAt.toISOString(),
  totals: summary.totals,
  entries: summary.entries.map((entry) => ({
    outputName: entry.outputName,
    location: entry.location,
    reviewCount: entry.reviewCount,
    averageRating: entry.averageRating,
    status: entry.status,
    error: entry.error ?? null,
    latitude: entry.coordinates?.latitude ?? null,
    longitude: entry.coordinates?.longitude ?? null
  }))
});

export class FileResultSink implements ResultSink {
  constructor(
    private readonly outputDir: string,
    private readonly layout: OutputLayout = "per_place"
  ) {}

  placeDirectory(outputName: string): string {
    return this.layout === "flat" ? this.outputDir : path.join(this.outputDir, "locations", outputName);
  }

  summaryDirectory(): string {
    return this.layout === "flat" ? this.outputDir : path.join(this.outputDir, "locations");
  }

  async writePlaceResult(place: PlaceConfig, result: ScrapeResult): Promise<void> {
    const dir = this.placeDirectory(place.outputName);
    await fs.mkdir(dir, { recursive: true });

    const payload = toPlaceExport(result);
    const jsonPath = path.join(dir, `${place.outputName}.json`);
    const xlsxPath = path.join(dir, `${place.outputName}.xlsx`);

    await writeJson(jsonPath, payload);
    await writeWorkbook(
      xlsxPath,
      "Reviews",
      REVIEW_COLUMNS,
      payload.reviews.map((review) => ({
        ...review,
        latitude: payload.coordinates?.latitude ?? "",
        longitude: payload.coordinates?.longitude ?? ""
      }))
    );

    console.log(JSON.stringify({ event: "export.place_written", outputName: place.outputName, json: jsonPath, xlsx: xlsxPath }));
  }

  async writeSummary(summary: BatchSummary): Promise<void> {
    const dir = this.summaryDirectory();
    await fs.mkdir(dir, { recursive: true });

    const payload = toSummaryExport(summary);
    const jsonPath = path.join(dir, "SUMMARY.json");
    const xlsxPath = path.join(dir, "SUMMARY.xlsx");

    await writeJson(jsonPath, payload);
    await writeWorkbook(
      xlsxPath,
      "Summary",
      SUMMARY_COLUMNS,
      payload.entries.map((entry) => ({
        outputName: entry.outputName,
        location: entry.location,
        reviewCount: entry.reviewCount,
        averageRating: entry.averageRating == null ? "N/A" : entry.averageRating.toFixed(2),
        status: entry.status,
        error: entry.error ?? "",
        latitude: entry.latitude ?? "",
        longitude: entry.longitude ?? ""
      }))
    );

    console.log(JSON.stringify({ event: "export.summary_written", json: jsonPath, xlsx: xlsxPath }));
  }
}
