import { input } from "@inquirer/prompts";
import { CatalogStore } from "../services/catalogStore";
import { IndexedRecord } from "../types";
import { describeRecord } from "../utils/fields";
import { parseSelection } from "../utils/parse";

/**
 * Picks one record by title fragment for edit and delete.
 * Several matches are listed and the user chooses one by number; a bad choice aborts
 * the operation and the user goes back to the menu.
 */
export class RecordSelector {
  constructor(private readonly store: CatalogStore) {}

  /**
   * @param titlePrompt - Message asking for the title fragment
   * @param action - Verb used in the choice prompt ("edit", "delete")
   * @returns The selected record with its catalog position, or null if the selection was aborted
   */
  async select(titlePrompt: string, action: string): Promise<IndexedRecord | null> {
    const query = await input({ message: titlePrompt });
    const matches = this.store.findByTitleSubstring(query);

    if (matches.length === 0) {
      console.log("No books found with that title.");
      return null;
    }

    if (matches.length === 1) {
      console.log(`\nSelected: ${describeRecord(matches[0].record)}`);
      return matches[0];
    }

    console.log("\nMatching books:");
    matches.forEach(({ record }, i) => {
      console.log(`${i + 1}. ${describeRecord(record)}`);
    });

    const answer = await input({ message: `Enter the number of the book to ${action}:` });
    const choice = parseSelection(answer, matches.length);

    if (!choice.ok) {
      console.log(`❌  ${choice.error}`);
      return null;
    }

    return matches[choice.value - 1];
  }
}
