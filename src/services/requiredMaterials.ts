import { z } from "zod";
import type { RequiredMaterials } from "../types/contracts.js";

// Blank entries are dropped.
const materialListSchema = z
  .array(z.string())
  .transform((materials) => materials.map((material) => material.trim()).filter((material) => material.length > 0));

export const requiredMaterialsSchema = z.union([
  materialListSchema,
  z.object({
    core: materialListSchema.default([]),
    optional: materialListSchema.default([])
  })
]);

export type RequiredMaterialsInput = z.input<typeof requiredMaterialsSchema>;

/**
 * Reads the `required_materials` column. A flat list means every entry is
 * mandatory; an object carries separate `core` and `optional` lists.
 * Returns null when the text is not JSON or has neither shape.
 */
export function parseRequiredMaterials(text: string): RequiredMaterials | null {
  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch {
    return null;
  }
  return toRequiredMaterials(decoded);
}

export function toRequiredMaterials(value: unknown): RequiredMaterials | null {
  const result = requiredMaterialsSchema.safeParse(value);
  if (!result.success) {
    return null;
  }

  const data = result.data;
  if (Array.isArray(data)) {
    return { kind: "flat", materials: data };
  }
  return { kind: "core_optional", core: data.core, optional: data.optional };
}

export function encodeRequiredMaterials(materials: RequiredMaterialsInput): string {
  return JSON.stringify(materials);
}
