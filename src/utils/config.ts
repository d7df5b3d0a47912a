import * as fs from "fs";
import * as path from "path";
import * as dotenv from "dotenv";
dotenv.config();

/**
 * Application configuration interface.
 */
export interface AppConfig {
  exportDir: string;
}

/**
 * Loads configuration from environment variables.
 *
 * @remarks CATALOG_EXPORT_DIR defaults to the current working directory
 * @throws {Error} If CATALOG_EXPORT_DIR points at something other than a directory
 */
export function loadConfig(): AppConfig {
  const configured = process.env.CATALOG_EXPORT_DIR?.trim();
  const exportDir = configured ? path.resolve(configured) : process.cwd();

  if (fs.existsSync(exportDir) && !fs.statSync(exportDir).isDirectory()) {
    throw new Error(
      `CATALOG_EXPORT_DIR is not a directory: ${exportDir}\n` +
        `Please check your .env file (see .env.example).`,
    );
  }

  return { exportDir };
}
