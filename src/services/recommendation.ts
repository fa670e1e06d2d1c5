import type { Recipe, Recommendation } from "../types/contracts.js";
import { scoreMatch } from "./matchScorer.js";

/**
 * Scores every recipe against the available materials and returns the best `topN`.
 *
 * Recipes with a zero ratio (a missing core material, or no listed materials)
 * are dropped. Ordering is match ratio descending, then fewer missing materials,
 * then catalog order.
 */
export function recommendRecipes(
  recipes: readonly Recipe[],
  available: ReadonlySet<string>,
  topN: number
): Recommendation[] {
  const limit = Math.max(0, Math.floor(topN));
  if (limit === 0 || available.size === 0) {
    return [];
  }

  const ranked: Recommendation[] = [];
  for (const recipe of recipes) {
    const score = scoreMatch(recipe.requiredMaterials, available);
    if (score.ratio <= 0) continue;

    ranked.push({
      name: recipe.name,
      imageURL: recipe.imageURL,
      matchRatio: toPercent(score.matched.length, score.matched.length + score.missing.length),
      matchedMaterials: score.matched,
      missingMaterials: score.missing,
      missingCount: score.missing.length,
      steps: recipe.steps
    });
  }

  // Array.prototype.sort is stable, so equal entries keep catalog order.
  ranked.sort((left, right) => right.matchRatio - left.matchRatio || left.missingCount - right.missingCount);

  return ranked.slice(0, limit);
}

// floor(matched / total * 100) without float rounding
function toPercent(matched: number, total: number): number {
  return total > 0 ? Math.floor((matched * 100) / total) : 0;
}
