import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { Workbook } from "exceljs";
import type { BatchSummary, ScrapeResult } from "../../src/core/scrape/ScrapeResult";
import { emptyScrapeStats } from "../../src/core/scrape/ScrapeResult";
import { FileResultSink, toSummaryExport } from "../../src/infrastructure/files/FileResultSink";

const place = { name: "Harbor Cafe", url: "https://maps.example.test/place/Harbor+Cafe", outputName: "HarborCafe" };

const result: ScrapeResult = {
  location: "Harbor Cafe",
  outputName: "HarborCafe",
  scrapedAt: new Date("2026-01-02T03:04:05.000Z"),
  coordinates: { latitude: 32.7, longitude: -96.8 },
  reviews: [{ reviewerName: "Ana", rating: 5, date: "a week ago", comment: "Great coffee" }],
  status: "success",
  stats: emptyScrapeStats()
};

const summary: BatchSummary = {
  generatedAt: new Date("2026-01-02T04:00:00.000Z"),
  entries: [
    { outputName: "HarborCafe", location: "Harbor Cafe", reviewCount: 2, averageRating: 4.5, coordinates: { latitude: 32.7, longitude: -96.8 }, status: "success" },
    { outputName: "BlueDoor", location: "Blue Door", reviewCount: 0, averageRating: null, coordinates: null, status: "failed", error: "PanelNotFoundError: Review panel not found on page" }
  ],
  totals: { places: 2, reviews: 2, byStatus: { success: 1, partial_success: 0, failed: 1 } }
};

const readSheet = async (filePath: string, sheetName: string) => {
  const workbook = new Workbook();
  await workbook.xlsx.readFile(filePath);
  const sheet = workbook.getWorksheet(sheetName);
  if (!sheet) throw new Error(`missing sheet ${sheetName}`);
  return sheet;
};

describe("FileResultSink", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "review-sink-"));
    jest.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("writes a place export per place directory", async () => {
    await new FileResultSink(dir).writePlaceResult(place, result);

    const placeDir = path.join(dir, "locations", "HarborCafe");
    const json = JSON.parse(await fs.readFile(path.join(placeDir, "HarborCafe.json"), "utf8"));
    expect(json).toEqual({
      location: "Harbor Cafe",
      scrapedAt: "2026-01-02T03:04:05.000Z",
      coordinates: { latitude: 32.7, longitude: -96.8 },
      totalReviews: 1,
      reviews: [{ name: "Ana", rating: 5, date: "a week ago", comment: "Great coffee" }]
    });

    const sheet = await readSheet(path.join(placeDir, "HarborCafe.xlsx"), "Reviews");
    expect(sheet.getRow(1).getCell(1).value).toBe("name");
    expect(sheet.getRow(2).getCell(1).value).toBe("Ana");
    expect(sheet.getRow(2).getCell(2).value).toBe("Great coffee");
    expect(sheet.getRow(2).getCell(3).value).toBe(5);
    expect(sheet.getRow(2).getCell(5).value).toBe(32.7);
  });

  it("writes flat files in single-place mode", async () => {
    await new FileResultSink(dir, "flat").writePlaceResult(place, { ...result, coordinates: null });

    const json = JSON.parse(await fs.readFile(path.join(dir, "HarborCafe.json"), "utf8"));
    expect(json.coordinates).toBeNull();
    await expect(fs.stat(path.join(dir, "HarborCafe.xlsx"))).resolves.toBeTruthy();
  });

  it("writes the batch summary next to the place directories", async () => {
    await new FileResultSink(dir).writeSummary(summary);

    const json = JSON.parse(await fs.readFile(path.join(dir, "locations", "SUMMARY.json"), "utf8"));
    expect(json).toEqual({
      generatedAt: "2026-01-02T04:00:00.000Z",
      totals: { places: 2, reviews: 2, byStatus: { success: 1, partial_success: 0, failed: 1 } },
      entries: [
        { outputName: "HarborCafe", location: "Harbor Cafe", reviewCount: 2, averageRating: 4.5, status: "success", error: null, latitude: 32.7, longitude: -96.8 },
        { outputName: "BlueDoor", location: "Blue Door", reviewCount: 0, averageRating: null, status: "failed", error: "PanelNotFoundError: Review panel not found on page", latitude: null, longitude: null }
      ]
    });

    const sheet = await readSheet(path.join(dir, "locations", "SUMMARY.xlsx"), "Summary");
    expect(sheet.getRow(1).getCell(4).value).toBe("Avg Rating");
    expect(sheet.getRow(2).getCell(4).value).toBe("4.50");
    expect(sheet.getRow(3).getCell(4).value).toBe("N/A");
    expect(sheet.getRow(3).getCell(5).value).toBe("failed");
  });

  it("maps summary entries without coordinates to null latitude and longitude", () => {
    expect(toSummaryExport(summary).entries[1]).toMatchObject({ latitude: null, longitude: null });
  });
});
