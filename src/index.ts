#!/usr/bin/env node
import * as dotenv from "dotenv";
dotenv.config();

import { CatalogCli } from "./app/catalogCli";
import { CatalogStore } from "./services/catalogStore";
import { loadConfig } from "./utils/config";

async function main(): Promise<void> {
  const app = new CatalogCli(new CatalogStore(), loadConfig());
  await app.run();
}

main().catch((err: unknown) => {
  // Ctrl+C inside a prompt
  if (err instanceof Error && err.name === "ExitPromptError") {
    console.log("\n👋  Goodbye!\n");
    return;
  }

  console.error("\n❌ Fatal error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
