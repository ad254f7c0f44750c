import { promises as fs } from "fs";
import path from "path";
import type { PlaceExportFile, PlaceExportListing, PlaceExportSource } from "../../ports/MergeStore";

const toErrorMessage = (reason: unknown): string => (reason instanceof Error ? reason.message : String(reason));

const isMissingPath = (err: unknown): boolean =>
  typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";

/**
 * Lists `<outputDir>/locations/<folder>/*.json`, one export per folder (the
 * first JSON file by name). Folders are visited in name order.
 */
export class PlaceExportReader implements PlaceExportSource {
  constructor(private readonly outputDir: string) {}

  locationsDirectory(): string {
    return path.join(this.outputDir, "locations");
  }

  async listPlaceExports(): Promise<PlaceExportListing> {
    const root = this.locationsDirectory();

    let folders: string[];
    try {
      const entries = await fs.readdir(root, { withFileTypes: true });
      folders = entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name).sort();
    } catch (err) {
      if (!isMissingPath(err)) throw err;
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({ event: "merge.locations_missing", directory: root }));
      return { files: [], skipped: 0 };
    }

    const files: PlaceExportFile[] = [];
    let skipped = 0;

    for (const folder of folders) {
      const names = await fs.readdir(path.join(root, folder));
      const jsonName = names.filter((name) => name.toLowerCase().endsWith(".json")).sort()[0];
      if (jsonName === undefined) {
        skipped += 1;
        // eslint-disable-next-line no-console
        console.warn(JSON.stringify({ event: "merge.file_skipped", sourceLocation: folder, reason: "no JSON export" }));
        continue;
      }

      try {
        const payload: unknown = JSON.parse(await fs.readFile(path.join(root, folder, jsonName), "utf8"));
        files.push({ sourceLocation: folder, sourceFile: jsonName, payload });
      } catch (err) {
        skipped += 1;
        // eslint-disable-next-line no-console
        console.warn(JSON.stringify({
          event: "merge.file_skipped",
          sourceLocation: folder,
          sourceFile: jsonName,
          reason: toErrorMessage(err)
        }));
      }
    }

    return { files, skipped };
  }
}
