import fs from "fs";
import path from "path";
import dotenv from "dotenv";

export const ENV_FILES = [".env.local", ".env"];

/** Load the env files that exist under `root`; earlier files win. Returns the loaded paths. */
export function loadEnvFiles(root: string = process.cwd(), files: string[] = ENV_FILES): string[] {
  const loaded: string[] = [];
  for (const file of files) {
    const full = path.join(root, file);
    if (fs.existsSync(full)) {
      dotenv.config({ path: full });
      loaded.push(full);
    }
  }
  return loaded;
}

// Imported first by every script so later modules see the variables
loadEnvFiles();
