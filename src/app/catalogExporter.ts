import * as fs from "fs";
import * as path from "path";
import { CatalogStore } from "../services/catalogStore";
import { BookRecord, ExportRecord } from "../types";
import { fromExportRecord } from "../utils/fields";
import { formatTimestamp } from "../utils/parse";

/**
 * Exports the catalog to a timestamped JSON file.
 * The catalog itself is never touched, whether the write succeeds or not.
 */
export class CatalogExporter {
  constructor(
    private readonly store: CatalogStore,
    private readonly exportDir: string,
  ) {}

  /**
   * Writes `books_export_<YYYYMMDD_HHMMSS>.json` into the export directory.
   *
   * @returns Path to the created file, or undefined if there was nothing to export or the write failed
   */
  async export(now: Date = new Date()): Promise<string | undefined> {
    if (this.store.size === 0) {
      console.log("No books to export yet!");
      return;
    }

    const filename = `books_export_${formatTimestamp(now)}.json`;
    const exportPath = path.join(this.exportDir, filename);

    try {
      await fs.promises.mkdir(this.exportDir, { recursive: true });
      await fs.promises.writeFile(
        exportPath,
        JSON.stringify(this.store.toExportRecords(), null, 2),
        { encoding: "utf-8", flag: "wx" },
      );
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`❌  Export failed: ${message}`);
      return;
    }

    console.log(`✅  Export complete: ${exportPath}`);
    return exportPath;
  }
}

function isExportRecord(value: unknown): value is ExportRecord {
  return (
    typeof value === "object" &&
    value !== null &&
    "Book" in value &&
    typeof value.Book === "string" &&
    "Author" in value &&
    typeof value.Author === "string" &&
    "Genre" in value &&
    typeof value.Genre === "string"
  );
}

/**
 * Reads an export file back into records.
 *
 * @throws {Error} If the file is not valid JSON or not an array of Book/Author/Genre objects
 */
export function readExportFile(filePath: string): BookRecord[] {
  const content = fs.readFileSync(filePath, "utf8");

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Corrupted export file: ${error.message}`);
    }
    throw error;
  }

  if (!Array.isArray(data) || !data.every(isExportRecord)) {
    throw new Error("Invalid export file structure");
  }

  return data.map(fromExportRecord);
}
