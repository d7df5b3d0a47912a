import { input } from "@inquirer/prompts";
import { CatalogStore } from "../services/catalogStore";
import { describeRecord } from "../utils/fields";

/**
 * Read-only catalog queries: full listing, combined search and genre search.
 */
export class CatalogSearch {
  constructor(private readonly store: CatalogStore) {}

  viewAll(): void {
    if (this.store.size === 0) {
      console.log("No books yet!");
      return;
    }

    for (const [position, record] of this.store.listAll()) {
      console.log(`\n--- Book ${position} ---`);
      console.log(`Book: ${record.title}`);
      console.log(`Author: ${record.author}`);
      console.log(`Genre: ${record.genre}`);
    }
  }

  /**
   * Matches the query against title, author and genre together.
   */
  async searchAll(): Promise<void> {
    if (this.store.size === 0) {
      console.log("No books in the database yet!");
      return;
    }

    const query = await input({ message: "Search for (title / author / genre):" });
    const matches = this.store.searchCombined(query);

    if (matches.length === 0) {
      console.log("No items found.");
      return;
    }

    matches.forEach((record) => console.log(`- ${describeRecord(record)}`));
  }

  async searchGenre(): Promise<void> {
    if (this.store.size === 0) {
      console.log("No books in the database yet!");
      return;
    }

    const query = await input({ message: "Enter the Genre to search for:" });
    const matches = this.store.searchByGenre(query);

    console.log(`\nBooks in Genre '${query.trim().toLowerCase()}':`);

    if (matches.length === 0) {
      console.log("No books found in that Genre.");
      return;
    }

    matches.forEach((record) => console.log(`- ${record.title} by ${record.author}`));
  }
}
