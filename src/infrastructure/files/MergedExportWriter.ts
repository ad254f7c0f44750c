import { promises as fs } from "fs";
import path from "path";
import type { CombinedReviewRow, ReviewGroup } from "../../core/merge/mergeReviews";
import type { MergedReviewSink } from "../../ports/MergeStore";
import { writeJson, writeWorkbook, type SheetColumn } from "./fileWriters";

const COMBINED_COLUMNS: SheetColumn[] = [
  { header: "name", key: "name", width: 28 },
  { header: "comment", key: "comment", width: 80 },
  { header: "rating", key: "rating", width: 8 },
  { header: "date", key: "date", width: 16 },
  { header: "latitude", key: "latitude", width: 12 },
  { header: "longitude", key: "longitude", width: 12 },
  { header: "source_location", key: "sourceLocation", width: 24 },
  { header: "source_file", key: "sourceFile", width: 28 }
];

const GROUP_COLUMNS: SheetColumn[] = [
  { header: "group_id", key: "groupId", width: 10 },
  { header: "representative_comment", key: "representativeComment", width: 80 },
  { header: "sample_name", key: "sampleName", width: 28 },
  { header: "occurrences", key: "occurrences", width: 12 },
  { header: "locations_merged", key: "locationsMerged", width: 40 },
  { header: "avg_rating", key: "averageRating", width: 12 },
  { header: "ratings_list", key: "ratings", width: 24 }
];

/**
 * `<outputDir>/all_reviews_combined.{json,xlsx}` and, when grouping ran,
 * `<outputDir>/all_reviews_groups.{json,xlsx}`. The groups sheet leaves out
 * the member rows; the JSON keeps them.
 */
export class MergedExportWriter implements MergedReviewSink {
  constructor(private readonly outputDir: string) {}

  async writeCombined(rows: readonly CombinedReviewRow[]): Promise<void> {
    await fs.mkdir(this.outputDir, { recursive: true });
    const jsonPath = path.join(this.outputDir, "all_reviews_combined.json");
    const xlsxPath = path.join(this.outputDir, "all_reviews_combined.xlsx");

    await writeJson(jsonPath, rows);
    await writeWorkbook(
      xlsxPath,
      "Reviews",
      COMBINED_COLUMNS,
      rows.map((row) => ({
        ...row,
        rating: row.rating ?? "",
        latitude: row.latitude ?? "",
        longitude: row.longitude ?? ""
      }))
    );

    console.log(JSON.stringify({ event: "export.combined_written", rows: rows.length, json: jsonPath, xlsx: xlsxPath }));
  }

  async writeGroups(groups: readonly ReviewGroup[]): Promise<void> {
    await fs.mkdir(this.outputDir, { recursive: true });
    const jsonPath = path.join(this.outputDir, "all_reviews_groups.json");
    const xlsxPath = path.join(this.outputDir, "all_reviews_groups.xlsx");

    await writeJson(jsonPath, groups);
    await writeWorkbook(
      xlsxPath,
      "Groups",
      GROUP_COLUMNS,
      groups.map((group) => ({
        groupId: group.groupId,
        representativeComment: group.representativeComment,
        sampleName: group.sampleName,
        occurrences: group.occurrences,
        locationsMerged: group.locationsMerged.join("; "),
        averageRating: group.averageRating ?? "",
        ratings: group.ratings.join(", ")
      }))
    );

    console.log(JSON.stringify({ event: "export.groups_written", groups: groups.length, json: jsonPath, xlsx: xlsxPath }));
  }
}
