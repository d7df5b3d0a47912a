import {
  AddOutcome,
  BookRecord,
  DeleteOutcome,
  EditOutcome,
  ExportRecord,
  IndexedRecord,
} from "../types";
import { parseFieldName, toExportRecord, writeField } from "../utils/fields";

const CONFIRMATION_TOKEN = "YES";

function normalizeQuery(query: string): string {
  return query.trim().toLowerCase();
}

/**
 * In-memory book catalog for a single run.
 * Records keep insertion order; their position is the only identity they have.
 */
export class CatalogStore {
  private records: BookRecord[] = [];

  get size(): number {
    return this.records.length;
  }

  /**
   * Appends a record. Values are trimmed; an empty title is rejected without mutation.
   */
  add(title: string, author: string, genre: string): AddOutcome {
    const record: BookRecord = {
      title: title.trim(),
      author: author.trim(),
      genre: genre.trim(),
    };

    if (!record.title) {
      return { status: "rejected", reason: "empty-title" };
    }

    this.records.push(record);
    return { status: "added", record: { ...record } };
  }

  /**
   * Yields `[position, record]` pairs, numbered from 1, in insertion order.
   */
  *listAll(): Generator<[number, BookRecord]> {
    for (let i = 0; i < this.records.length; i++) {
      yield [i + 1, { ...this.records[i] }];
    }
  }

  /**
   * Case-insensitive substring match on the title only.
   *
   * @returns Matches with their 0-based position in the catalog
   */
  findByTitleSubstring(query: string): IndexedRecord[] {
    const needle = normalizeQuery(query);
    const matches: IndexedRecord[] = [];

    this.records.forEach((record, index) => {
      if (record.title.toLowerCase().includes(needle)) {
        matches.push({ index, record: { ...record } });
      }
    });

    return matches;
  }

  /**
   * Case-insensitive substring match on "title author genre".
   */
  searchCombined(query: string): BookRecord[] {
    const needle = normalizeQuery(query);

    return this.records
      .filter((record) =>
        `${record.title} ${record.author} ${record.genre}`.toLowerCase().includes(needle),
      )
      .map((record) => ({ ...record }));
  }

  searchByGenre(query: string): BookRecord[] {
    const needle = normalizeQuery(query);

    return this.records
      .filter((record) => record.genre.toLowerCase().includes(needle))
      .map((record) => ({ ...record }));
  }

  /**
   * Overwrites one field of the record at `index`.
   *
   * @param fieldName - Field label as shown to the user ("Book", "Author" or "Genre")
   */
  edit(index: number, fieldName: string, newValue: string): EditOutcome {
    const field = parseFieldName(fieldName);
    if (!field) {
      return "invalid-field";
    }

    const value = newValue.trim();
    if (!value) {
      return "no-change";
    }

    const record = this.records[index];
    if (!record) {
      return "not-found";
    }

    writeField(record, field, value);
    return "updated";
  }

  /**
   * Removes the record at `index` when the confirmation reads "YES" once upper-cased.
   */
  delete(index: number, confirmation: string): DeleteOutcome {
    if (index < 0 || index >= this.records.length) {
      return { status: "not-found" };
    }

    if (confirmation.trim().toUpperCase() !== CONFIRMATION_TOKEN) {
      return { status: "cancelled" };
    }

    const [removed] = this.records.splice(index, 1);
    return { status: "deleted", record: removed };
  }

  /**
   * Returns a copy of all records to prevent external modifications.
   */
  getRecords(): BookRecord[] {
    return this.records.map((record) => ({ ...record }));
  }

  toExportRecords(): ExportRecord[] {
    return this.records.map(toExportRecord);
  }
}
