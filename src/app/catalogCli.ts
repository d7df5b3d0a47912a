import { input } from "@inquirer/prompts";
import { AppConfig } from "../utils/config";
import { CatalogStore } from "../services/catalogStore";
import { CatalogExporter } from "./catalogExporter";
import { CatalogSearch } from "./catalogSearch";
import { RecordCreator } from "./recordCreator";
import { RecordEditor } from "./recordEditor";
import { RecordRemover } from "./recordRemover";

const MENU_OPTIONS = [
  "Add new Book",
  "View all Books",
  "Search Book",
  "Edit Book",
  "Delete Book",
  "Search by Genre",
  "Export to file",
  "Exit",
];

/**
 * Interactive CLI for the in-memory book catalog.
 * Every operation returns to the menu, whatever its outcome.
 */
export class CatalogCli {
  private readonly search: CatalogSearch;
  private readonly creator: RecordCreator;
  private readonly editor: RecordEditor;
  private readonly remover: RecordRemover;
  private readonly exporter: CatalogExporter;

  constructor(
    private readonly store: CatalogStore,
    config: AppConfig,
  ) {
    this.search = new CatalogSearch(store);
    this.creator = new RecordCreator(store);
    this.editor = new RecordEditor(store);
    this.remover = new RecordRemover(store);
    this.exporter = new CatalogExporter(store, config.exportDir);
  }

  /**
   * Application entry point. Shows the banner and runs the menu until Exit.
   */
  async run(): Promise<void> {
    this.showWelcome();
    await this.showMainMenu();
  }

  private showWelcome(): void {
    console.log("\n" + "=".repeat(60));
    console.log("    📚  BOOK CATALOG - In-memory reading list       ");
    console.log("=".repeat(60));
  }

  private printMenu(): void {
    console.log("\n=== My Personal Database ===");
    MENU_OPTIONS.forEach((option, i) => console.log(`${i + 1}. ${option}`));
    console.log(`Books in catalog: ${this.store.size}`);
  }

  private async showMainMenu(): Promise<void> {
    while (true) {
      this.printMenu();

      const choice = (await input({ message: "Choose an option:" })).trim();

      switch (choice) {
        case "1":
          await this.creator.create();
          break;
        case "2":
          this.search.viewAll();
          break;
        case "3":
          await this.search.searchAll();
          break;
        case "4":
          await this.editor.edit();
          break;
        case "5":
          await this.remover.remove();
          break;
        case "6":
          await this.search.searchGenre();
          break;
        case "7":
          await this.exporter.export();
          break;
        case "8":
          console.log("\n👋  Goodbye!\n");
          return;
        default:
          console.log("❌  Invalid option.");
      }
    }
  }
}
