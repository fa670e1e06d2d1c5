import type { Recipe } from "../types/contracts.js";
import { createChildLogger } from "../utils/logger.js";
import { CatalogDatabase, type CatalogSeed, type MappingRow, type RecipeRow } from "./catalogDatabase.js";
import { PLACEHOLDER_SEED, readCatalogSeed, type SeedPaths } from "./catalogSeed.js";
import { parseRequiredMaterials, toRequiredMaterials } from "./requiredMaterials.js";

const log = createChildLogger({ module: "catalog" });

export type CatalogStoreOptions = SeedPaths & {
  dbPath: string;
};

export type CatalogSource = "storage" | "placeholder" | "empty";

export type CatalogSnapshot = {
  source: CatalogSource;
  recipes: readonly Recipe[];
  mapping: ReadonlyMap<string, string>;
};

const EMPTY_SNAPSHOT: CatalogSnapshot = {
  source: "empty",
  recipes: [],
  mapping: new Map()
};

type StorageRead =
  | { status: "loaded"; snapshot: CatalogSnapshot }
  | { status: "missing" }
  | { status: "unreadable" };

/**
 * Owns the recipe catalog and the receipt-item mapping for the lifetime of the
 * process. The first call to `load()` reads the SQLite catalog, seeding it from
 * the JSON files when it is missing, unreadable or empty. An unreadable file is
 * removed before seeding. Every later call returns the same snapshot.
 *
 * Concurrent first calls share one pending load.
 */
export class CatalogStore {
  private readonly options: CatalogStoreOptions;
  private snapshot: CatalogSnapshot | null = null;
  private pending: Promise<CatalogSnapshot> | null = null;
  private database: CatalogDatabase | null = null;

  constructor(options: CatalogStoreOptions) {
    this.options = options;
  }

  get isLoaded(): boolean {
    return this.snapshot !== null;
  }

  load(): Promise<CatalogSnapshot> {
    if (this.snapshot) {
      return Promise.resolve(this.snapshot);
    }
    if (!this.pending) {
      this.pending = this.loadOnce();
    }
    return this.pending;
  }

  async getRecipes(): Promise<readonly Recipe[]> {
    return (await this.load()).recipes;
  }

  async getMapping(): Promise<ReadonlyMap<string, string>> {
    return (await this.load()).mapping;
  }

  private async loadOnce(): Promise<CatalogSnapshot> {
    let snapshot: CatalogSnapshot;
    try {
      snapshot = await this.loadSnapshot();
    } finally {
      this.closeDatabase();
    }

    log.info({
      msg: "Catalog loaded",
      source: snapshot.source,
      recipes: snapshot.recipes.length,
      mappings: snapshot.mapping.size
    });
    this.snapshot = snapshot;
    return snapshot;
  }

  private async loadSnapshot(): Promise<CatalogSnapshot> {
    const stored = await this.readStorage();
    if (stored.status === "loaded") {
      return stored.snapshot;
    }

    const seed = this.readSeed();
    if (!seed) {
      log.warn({ msg: "Using placeholder catalog", dbPath: this.options.dbPath });
      return snapshotFromSeed(PLACEHOLDER_SEED);
    }

    try {
      if (stored.status === "unreadable") {
        this.closeDatabase();
        CatalogDatabase.discard(this.options.dbPath);
        log.warn({ msg: "Removed unreadable catalog database", dbPath: this.options.dbPath });
      }
      const db = await this.openDatabase();
      const result = db.reset(seed);
      log.info({ msg: "Catalog database initialized", dbPath: this.options.dbPath, ...result });
    } catch (error) {
      log.error({ msg: "Catalog initialization failed", dbPath: this.options.dbPath, error: errorMessage(error) });
      return EMPTY_SNAPSHOT;
    }

    const reloaded = await this.readStorage();
    if (reloaded.status !== "loaded") {
      log.error({ msg: "Catalog is still empty after initialization", dbPath: this.options.dbPath });
      return EMPTY_SNAPSHOT;
    }
    return reloaded.snapshot;
  }

  private async readStorage(): Promise<StorageRead> {
    if (!CatalogDatabase.exists(this.options.dbPath)) {
      log.info({ msg: "Catalog database not found", dbPath: this.options.dbPath });
      return { status: "missing" };
    }

    let recipeRows: RecipeRow[];
    let mappingRows: MappingRow[];
    try {
      const db = await this.openDatabase();
      if (!db.hasSchema()) {
        log.info({ msg: "Catalog database has no tables", dbPath: this.options.dbPath });
        return { status: "missing" };
      }
      recipeRows = db.readRecipes();
      mappingRows = db.readMappings();
    } catch (error) {
      log.error({ msg: "Catalog database unreadable", dbPath: this.options.dbPath, error: errorMessage(error) });
      return { status: "unreadable" };
    }

    if (recipeRows.length === 0 || mappingRows.length === 0) {
      log.warn({
        msg: "Catalog database is empty",
        recipes: recipeRows.length,
        mappings: mappingRows.length
      });
      return { status: "missing" };
    }

    return {
      status: "loaded",
      snapshot: {
        source: "storage",
        recipes: recipesFromRows(recipeRows),
        mapping: mappingFromRows(mappingRows)
      }
    };
  }

  private readSeed(): CatalogSeed | null {
    try {
      return readCatalogSeed(this.options);
    } catch (error) {
      log.warn({ msg: "Seed files unusable", error: errorMessage(error) });
      return null;
    }
  }

  private async openDatabase(): Promise<CatalogDatabase> {
    if (!this.database) {
      this.database = await CatalogDatabase.open(this.options.dbPath);
    }
    return this.database;
  }

  private closeDatabase(): void {
    this.database?.close();
    this.database = null;
  }
}

function recipesFromRows(rows: RecipeRow[]): Recipe[] {
  const recipes: Recipe[] = [];
  for (const row of rows) {
    const requiredMaterials = parseRequiredMaterials(row.required_materials);
    if (!requiredMaterials) {
      log.warn({ msg: "Skipping recipe with malformed materials", recipeId: row.recipe_id, name: row.name });
      continue;
    }
    recipes.push({
      id: row.recipe_id,
      name: row.name,
      requiredMaterials,
      steps: row.steps ?? undefined,
      imageURL: row.image_url ?? undefined
    });
  }
  return recipes;
}

function mappingFromRows(rows: MappingRow[]): Map<string, string> {
  const mapping = new Map<string, string>();
  for (const row of rows) {
    if (!mapping.has(row.receipt_item)) {
      mapping.set(row.receipt_item, row.standard_material);
    }
  }
  return mapping;
}

function snapshotFromSeed(seed: CatalogSeed): CatalogSnapshot {
  const recipes: Recipe[] = [];
  seed.recipes.forEach((recipe, index) => {
    const requiredMaterials = toRequiredMaterials(recipe.materials);
    if (requiredMaterials) {
      recipes.push({ id: index + 1, name: recipe.name, requiredMaterials, steps: recipe.steps, imageURL: recipe.image_url });
    }
  });

  const mapping = new Map<string, string>();
  for (const entry of seed.mappings) {
    if (!mapping.has(entry.item)) {
      mapping.set(entry.item, entry.material);
    }
  }

  return { source: "placeholder", recipes, mapping };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
