import { input } from "@inquirer/prompts";
import { CatalogStore } from "../services/catalogStore";

/**
 * Handles interactive creation of catalog records.
 */
export class RecordCreator {
  constructor(private readonly store: CatalogStore) {}

  /**
   * Prompts for all three fields, then validates the title.
   */
  async create(): Promise<void> {
    const title = await input({ message: "Enter name of Book:" });
    const author = await input({ message: "Enter name of Author:" });
    const genre = await input({ message: "Enter name of Genre:" });

    const outcome = this.store.add(title, author, genre);

    if (outcome.status === "rejected") {
      console.log("❌  Book title cannot be empty.");
      return;
    }

    console.log("✅  Book added successfully!");
  }
}
