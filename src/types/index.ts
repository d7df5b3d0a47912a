export const BOOK_FIELDS = ["title", "author", "genre"] as const;

export type BookField = (typeof BOOK_FIELDS)[number];

export interface BookRecord {
  title: string;
  author: string;
  genre: string;
}

export interface IndexedRecord {
  index: number;
  record: BookRecord;
}

/**
 * Shape of one record in an export file. Keys are the user-facing field labels.
 */
export interface ExportRecord {
  Book: string;
  Author: string;
  Genre: string;
}

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

export type AddOutcome =
  | { status: "added"; record: BookRecord }
  | { status: "rejected"; reason: "empty-title" };

export type EditOutcome = "updated" | "invalid-field" | "no-change" | "not-found";

export type DeleteOutcome =
  | { status: "deleted"; record: BookRecord }
  | { status: "cancelled" }
  | { status: "not-found" };
