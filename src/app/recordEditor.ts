import { input } from "@inquirer/prompts";
import { CatalogStore } from "../services/catalogStore";
import { BOOK_FIELDS } from "../types";
import { FIELD_LABELS, parseFieldName, readField } from "../utils/fields";
import { RecordSelector } from "./recordSelector";

/**
 * Edits a single field of a record chosen through the selection prompt.
 */
export class RecordEditor {
  private readonly selector: RecordSelector;

  constructor(private readonly store: CatalogStore) {
    this.selector = new RecordSelector(store);
  }

  async edit(): Promise<void> {
    if (this.store.size === 0) {
      console.log("No books to edit yet!");
      return;
    }

    const selected = await this.selector.select("Enter the Book title to edit:", "edit");
    if (!selected) return;

    console.log("\nWhich field do you want to edit?");
    BOOK_FIELDS.forEach((field) => console.log(`- ${FIELD_LABELS[field]}`));

    const fieldName = (await input({ message: "Enter field name exactly as shown:" })).trim();
    const field = parseFieldName(fieldName);

    if (!field) {
      console.log("❌  Invalid field name.");
      return;
    }

    const newValue = await input({
      message: `Enter new value for ${fieldName} (current: ${readField(selected.record, field)}):`,
    });

    switch (this.store.edit(selected.index, fieldName, newValue)) {
      case "updated":
        console.log("✅  Book updated successfully!");
        break;
      case "no-change":
        console.log("No change made.");
        break;
      case "invalid-field":
        console.log("❌  Invalid field name.");
        break;
      case "not-found":
        console.log("❌  Book no longer exists.");
        break;
    }
  }
}
