import { BOOK_FIELDS, BookField, BookRecord, ExportRecord } from "../types";

/**
 * User-facing label of each field. Labels are what the user types when editing
 * and the keys written to export files.
 */
export const FIELD_LABELS: Record<BookField, keyof ExportRecord> = {
  title: "Book",
  author: "Author",
  genre: "Genre",
};

/**
 * Resolves a label typed by the user to a field. Matching is exact and case-sensitive.
 */
export function parseFieldName(label: string): BookField | null {
  return BOOK_FIELDS.find((field) => FIELD_LABELS[field] === label) ?? null;
}

export function readField(record: BookRecord, field: BookField): string {
  return record[field];
}

export function writeField(record: BookRecord, field: BookField, value: string): void {
  record[field] = value;
}

export function toExportRecord(record: BookRecord): ExportRecord {
  return {
    Book: record.title,
    Author: record.author,
    Genre: record.genre,
  };
}

export function fromExportRecord(entry: ExportRecord): BookRecord {
  return {
    title: entry.Book,
    author: entry.Author,
    genre: entry.Genre,
  };
}

/**
 * Formats a record as "Title by Author (Genre)".
 */
export function describeRecord(record: BookRecord): string {
  return `${record.title} by ${record.author} (${record.genre})`;
}
