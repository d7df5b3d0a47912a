import { RecordSelector } from "../../src/app/recordSelector";
import { CatalogStore } from "../../src/services/catalogStore";
import { TestHelpers } from "../helpers/testHelpers";
import { input } from "@inquirer/prompts";

describe("RecordSelector", () => {
  let store: CatalogStore;
  let selector: RecordSelector;
  let logLines: () => string[];

  beforeEach(() => {
    logLines = TestHelpers.captureLog();
    store = TestHelpers.createStore(
      ["Dune", "Herbert", "SciFi"],
      ["Emma", "Austen", "Romance"],
      ["Dune2", "Herbert", "SciFi"],
    );
    selector = new RecordSelector(store);
  });

  it("should select a single match without asking for a number", async () => {
    TestHelpers.answerPrompts("EMM");

    const selected = await selector.select("Title?", "edit");

    expect(selected).toEqual({
      index: 1,
      record: { title: "Emma", author: "Austen", genre: "Romance" },
    });
    expect(input).toHaveBeenCalledTimes(1);
    expect(logLines()).toContain("\nSelected: Emma by Austen (Romance)");
  });

  it("should list several matches and return the chosen one", async () => {
    TestHelpers.answerPrompts("dune", "2");

    const selected = await selector.select("Title?", "delete");

    expect(selected).toEqual({
      index: 2,
      record: { title: "Dune2", author: "Herbert", genre: "SciFi" },
    });

    const lines = logLines();
    expect(lines).toContain("\nMatching books:");
    expect(lines).toContain("1. Dune by Herbert (SciFi)");
    expect(lines).toContain("2. Dune2 by Herbert (SciFi)");
    expect(input).toHaveBeenLastCalledWith({ message: "Enter the number of the book to delete:" });
  });

  it("should abort when nothing matches", async () => {
    TestHelpers.answerPrompts("Ubik");

    await expect(selector.select("Title?", "edit")).resolves.toBeNull();
    expect(logLines()).toContain("No books found with that title.");
  });

  it("should abort on a non-numeric choice", async () => {
    TestHelpers.answerPrompts("dune", "first");

    await expect(selector.select("Title?", "edit")).resolves.toBeNull();
    expect(logLines()).toContain("❌  Please enter a valid number.");
  });

  it("should abort on an out-of-range choice", async () => {
    TestHelpers.answerPrompts("dune", "3");

    await expect(selector.select("Title?", "edit")).resolves.toBeNull();
    expect(logLines()).toContain("❌  Invalid selection.");
  });

  it("should match the title only", async () => {
    TestHelpers.answerPrompts("austen");

    await expect(selector.select("Title?", "edit")).resolves.toBeNull();
  });
});
