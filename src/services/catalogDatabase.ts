import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import sqlJs, { type Database, type SqlJsStatic } from "sql.js";
import type { MappingSeed, RecipeSeed } from "../types/contracts.js";
import { encodeRequiredMaterials } from "./requiredMaterials.js";

export type RecipeRow = {
  recipe_id: number;
  name: string;
  required_materials: string;
  steps: string | null;
  image_url: string | null;
};

export type MappingRow = {
  receipt_item: string;
  standard_material: string;
};

export type CatalogSeed = {
  recipes: RecipeSeed[];
  mappings: MappingSeed[];
};

export type SeedResult = {
  recipes: number;
  mappings: number;
  skippedMappings: number;
};

const IN_MEMORY_PATH = ":memory:";

let sqlModule: Promise<SqlJsStatic> | null = null;

/** Loads the sql.js wasm build once per process. */
export function loadSqlJs(): Promise<SqlJsStatic> {
  if (!sqlModule) {
    sqlModule = sqlJs.default();
  }
  return sqlModule;
}

/**
 * SQLite catalog held in memory by sql.js. `open` reads the file image from
 * disk; `reset` writes the whole image back after a successful commit.
 */
export class CatalogDatabase {
  readonly dbPath: string;

  private readonly db: Database;

  private constructor(dbPath: string, db: Database) {
    this.dbPath = dbPath;
    this.db = db;
  }

  static async open(dbPath: string): Promise<CatalogDatabase> {
    const SQL = await loadSqlJs();
    if (dbPath !== IN_MEMORY_PATH && existsSync(dbPath)) {
      return new CatalogDatabase(dbPath, new SQL.Database(readFileSync(dbPath)));
    }
    return new CatalogDatabase(dbPath, new SQL.Database());
  }

  static exists(dbPath: string): boolean {
    return dbPath === IN_MEMORY_PATH || existsSync(dbPath);
  }

  /** Removes the database file and any journal files left beside it. */
  static discard(dbPath: string): void {
    if (dbPath === IN_MEMORY_PATH) {
      return;
    }
    for (const file of [dbPath, `${dbPath}-wal`, `${dbPath}-shm`, `${dbPath}-journal`]) {
      rmSync(file, { force: true });
    }
  }

  hasSchema(): boolean {
    const [result] = this.db.exec(`
      SELECT COUNT(*) FROM sqlite_master
      WHERE type = 'table' AND name IN ('Recipes', 'MaterialMapping')
    `);
    return result?.values[0]?.[0] === 2;
  }

  /**
   * Drops both tables and reloads them from the seed. Mapping rows whose
   * receipt item is already present are ignored, so the first entry wins.
   */
  reset(seed: CatalogSeed): SeedResult {
    this.db.run("BEGIN");
    let result: SeedResult;
    try {
      result = this.replaceTables(seed);
      this.db.run("COMMIT");
    } catch (error) {
      this.db.run("ROLLBACK");
      throw error;
    }

    this.save();
    return result;
  }

  readRecipes(): RecipeRow[] {
    return this.selectAll(
      `
        SELECT recipe_id, name, required_materials, steps, image_url
        FROM Recipes
        ORDER BY recipe_id
      `,
      (row) => ({
        recipe_id: Number(row.recipe_id),
        name: String(row.name),
        required_materials: String(row.required_materials),
        steps: optionalText(row.steps),
        image_url: optionalText(row.image_url)
      })
    );
  }

  readMappings(): MappingRow[] {
    return this.selectAll(
      `
        SELECT receipt_item, standard_material
        FROM MaterialMapping
        ORDER BY mapping_id
      `,
      (row) => ({
        receipt_item: String(row.receipt_item),
        standard_material: String(row.standard_material)
      })
    );
  }

  close(): void {
    this.db.close();
  }

  private replaceTables(seed: CatalogSeed): SeedResult {
    this.db.exec(`
      DROP TABLE IF EXISTS Recipes;
      DROP TABLE IF EXISTS MaterialMapping;
      CREATE TABLE Recipes (
        recipe_id INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        required_materials TEXT NOT NULL,
        steps TEXT,
        image_url TEXT
      );
      CREATE TABLE MaterialMapping (
        mapping_id INTEGER PRIMARY KEY,
        receipt_item TEXT NOT NULL UNIQUE,
        standard_material TEXT NOT NULL
      );
    `);

    const insertRecipe = this.db.prepare(
      "INSERT INTO Recipes (name, required_materials, steps, image_url) VALUES (?, ?, ?, ?)"
    );
    try {
      for (const recipe of seed.recipes) {
        insertRecipe.run([
          recipe.name,
          encodeRequiredMaterials(recipe.materials),
          recipe.steps ?? null,
          recipe.image_url ?? null
        ]);
      }
    } finally {
      insertRecipe.free();
    }

    const insertMapping = this.db.prepare(
      "INSERT OR IGNORE INTO MaterialMapping (receipt_item, standard_material) VALUES (?, ?)"
    );
    let mappings = 0;
    try {
      for (const mapping of seed.mappings) {
        insertMapping.run([mapping.item, mapping.material]);
        mappings += this.db.getRowsModified();
      }
    } finally {
      insertMapping.free();
    }

    return {
      recipes: seed.recipes.length,
      mappings,
      skippedMappings: seed.mappings.length - mappings
    };
  }

  private selectAll<T>(sql: string, toRow: (row: Record<string, unknown>) => T): T[] {
    const statement = this.db.prepare(sql);
    try {
      const rows: T[] = [];
      while (statement.step()) {
        rows.push(toRow(statement.getAsObject()));
      }
      return rows;
    } finally {
      statement.free();
    }
  }

  private save(): void {
    if (this.dbPath === IN_MEMORY_PATH) {
      return;
    }
    mkdirSync(dirname(this.dbPath), { recursive: true });
    writeFileSync(this.dbPath, this.db.export());
  }
}

function optionalText(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}
