import path from "node:path";
import { getEnv } from "../src/config/env.js";
import { CatalogDatabase } from "../src/services/catalogDatabase.js";
import { readCatalogSeed } from "../src/services/catalogSeed.js";
import { logger } from "../src/utils/logger.js";

// Rebuilds the catalog database from the JSON seed files.
async function seedCatalog(): Promise<void> {
  const env = getEnv();
  const recipesPath = path.resolve(process.argv[2] ?? env.RECIPES_SEED_PATH);
  const mappingsPath = path.resolve(process.argv[3] ?? env.MAPPINGS_SEED_PATH);

  const seed = readCatalogSeed({ recipesPath, mappingsPath });
  if (!seed) {
    throw new Error(`Seed files not found: ${recipesPath}, ${mappingsPath}`);
  }

  const db = await CatalogDatabase.open(env.CATALOG_DB_PATH);
  try {
    const result = db.reset(seed);
    logger.info({
      msg: "Catalog seeded",
      dbPath: env.CATALOG_DB_PATH,
      ...result,
    });
  } finally {
    db.close();
  }
}

seedCatalog().catch((error: unknown) => {
  logger.error({
    msg: "Error seeding catalog",
    error: error instanceof Error ? error.message : String(error),
  });
  process.exitCode = 1;
});
