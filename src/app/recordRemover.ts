import { input } from "@inquirer/prompts";
import { CatalogStore } from "../services/catalogStore";
import { RecordSelector } from "./recordSelector";

/**
 * Deletes a record after the user types YES.
 */
export class RecordRemover {
  private readonly selector: RecordSelector;

  constructor(private readonly store: CatalogStore) {
    this.selector = new RecordSelector(store);
  }

  async remove(): Promise<void> {
    if (this.store.size === 0) {
      console.log("No books to delete yet!");
      return;
    }

    const selected = await this.selector.select("Enter the title of the Book to delete:", "delete");
    if (!selected) return;

    const confirmation = await input({
      message: `Type YES to confirm delete '${selected.record.title}':`,
    });

    const outcome = this.store.delete(selected.index, confirmation);

    switch (outcome.status) {
      case "deleted":
        console.log("✅  Book deleted successfully!");
        break;
      case "cancelled":
        console.log("Delete cancelled.");
        break;
      case "not-found":
        console.log("❌  Book no longer exists.");
        break;
    }
  }
}
