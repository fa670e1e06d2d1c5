import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";
import { createChildLogger } from "../utils/logger.js";
import type { CatalogSeed } from "./catalogDatabase.js";
import { requiredMaterialsSchema } from "./requiredMaterials.js";

const log = createChildLogger({ module: "catalog-seed" });

const recipeSeedSchema = z.object({
  name: z.string().trim().min(1),
  materials: requiredMaterialsSchema,
  steps: z.string().optional(),
  image_url: z.string().optional()
});

const mappingSeedSchema = z.object({
  item: z.string().min(1),
  material: z.string().trim().min(1)
});

export type SeedPaths = {
  recipesPath: string;
  mappingsPath: string;
};

export const PLACEHOLDER_SEED: CatalogSeed = {
  recipes: [{ name: "샘플 김치찌개", materials: { core: ["김치"], optional: ["두부"] } }],
  mappings: [{ item: "샘플김치", material: "김치" }]
};

export class SeedFileError extends Error {
  constructor(
    message: string,
    readonly path: string
  ) {
    super(message);
    this.name = "SeedFileError";
  }
}

/**
 * Reads both seed files. Returns null when either file is missing; throws
 * SeedFileError when a file is not a JSON array. Entries that fail validation
 * are skipped one by one.
 */
export function readCatalogSeed(paths: SeedPaths): CatalogSeed | null {
  const missing = [paths.recipesPath, paths.mappingsPath].filter((path) => !existsSync(path));
  if (missing.length > 0) {
    log.warn({ msg: "Seed files not found", missing });
    return null;
  }

  return {
    recipes: readEntries(paths.recipesPath, recipeSeedSchema),
    mappings: readEntries(paths.mappingsPath, mappingSeedSchema)
  };
}

function readEntries<S extends z.ZodTypeAny>(path: string, schema: S): z.infer<S>[] {
  let decoded: unknown;
  try {
    decoded = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    throw new SeedFileError(`Cannot read seed file: ${errorMessage(error)}`, path);
  }

  if (!Array.isArray(decoded)) {
    throw new SeedFileError("Seed file must contain a JSON array", path);
  }

  const entries: z.infer<S>[] = [];
  decoded.forEach((raw, index) => {
    const parsed = schema.safeParse(raw);
    if (parsed.success) {
      entries.push(parsed.data);
      return;
    }
    log.warn({
      msg: "Skipping invalid seed entry",
      path,
      index,
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    });
  });
  return entries;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
