import {
  describeRecord,
  fromExportRecord,
  parseFieldName,
  readField,
  toExportRecord,
  writeField,
} from "../src/utils/fields";
import { formatTimestamp, parseSelection } from "../src/utils/parse";

describe("Field accessors", () => {
  test("should resolve exact labels", () => {
    expect(parseFieldName("Book")).toBe("title");
    expect(parseFieldName("Author")).toBe("author");
    expect(parseFieldName("Genre")).toBe("genre");
  });

  test("should reject unknown or differently cased labels", () => {
    expect(parseFieldName("book")).toBeNull();
    expect(parseFieldName("title")).toBeNull();
    expect(parseFieldName("")).toBeNull();
  });

  test("should read and write through the field name", () => {
    const record = { title: "Dune", author: "Herbert", genre: "SciFi" };

    writeField(record, "author", "F. Herbert");

    expect(readField(record, "author")).toBe("F. Herbert");
    expect(record).toEqual({ title: "Dune", author: "F. Herbert", genre: "SciFi" });
  });

  test("should convert to and from export keys", () => {
    const record = { title: "Dune", author: "Herbert", genre: "SciFi" };
    const exported = toExportRecord(record);

    expect(exported).toEqual({ Book: "Dune", Author: "Herbert", Genre: "SciFi" });
    expect(fromExportRecord(exported)).toEqual(record);
  });

  test("should describe a record on one line", () => {
    expect(describeRecord({ title: "Dune", author: "Herbert", genre: "SciFi" })).toBe(
      "Dune by Herbert (SciFi)",
    );
  });
});

describe("parseSelection()", () => {
  test("should accept numbers within range", () => {
    expect(parseSelection("1", 3)).toEqual({ ok: true, value: 1 });
    expect(parseSelection(" 3 ", 3)).toEqual({ ok: true, value: 3 });
    expect(parseSelection("+2", 3)).toEqual({ ok: true, value: 2 });
  });

  test("should reject non-numeric input", () => {
    for (const raw of ["", "abc", "1.5", "2x"]) {
      expect(parseSelection(raw, 3)).toEqual({ ok: false, error: "Please enter a valid number." });
    }
  });

  test("should reject numbers out of range", () => {
    for (const raw of ["0", "4", "-1"]) {
      expect(parseSelection(raw, 3)).toEqual({ ok: false, error: "Invalid selection." });
    }
  });
});

describe("formatTimestamp()", () => {
  test("should format local time as YYYYMMDD_HHMMSS", () => {
    expect(formatTimestamp(new Date(2024, 0, 5, 9, 3, 7))).toBe("20240105_090307");
    expect(formatTimestamp(new Date(2023, 11, 31, 23, 59, 59))).toBe("20231231_235959");
  });
});
