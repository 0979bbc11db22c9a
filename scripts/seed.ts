/**
 * Seed script: inserts demo projects and content into the configured store.
 *
 * Usage:
 *   npm run seed
 *
 * Reads .env.local when present. With CATALOG_STORE=supabase (the default)
 * it needs NEXT_PUBLIC_SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY.
 */

import * as fs from "fs";
import * as path from "path";
import { seedCatalog } from "../app/lib/seed";
import { createServices } from "../app/lib/services";

// Values already in the environment win over the file.
function loadEnv() {
  const envPath = path.resolve(process.cwd(), ".env.local");
  if (!fs.existsSync(envPath)) return;
  const lines = fs.readFileSync(envPath, "utf-8").split("\n");
  for (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eqIdx = trimmed.indexOf("=");
    if (eqIdx === -1) continue;
    const key = trimmed.slice(0, eqIdx);
    const value = trimmed.slice(eqIdx + 1);
    if (!process.env[key]) {
      process.env[key] = value;
    }
  }
}

async function main() {
  loadEnv();
  const { store, logger } = createServices();
  const seedLogger = logger.child("seed");

  if (!(await store.ping())) {
    seedLogger.error("Cannot reach the catalog store", { ...store.describe() });
    process.exit(1);
  }

  const result = await seedCatalog(store, seedLogger);
  console.log(
    `Projects: ${result.projects.created} created, ${result.projects.skipped} skipped. ` +
      `Content: ${result.content.created} created, ${result.content.skipped} skipped.`,
  );
}

main().catch((err: unknown) => {
  console.error("Seed failed:", err);
  process.exit(1);
});
