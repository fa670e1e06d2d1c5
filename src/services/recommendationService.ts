import type { Recommendation } from "../types/contracts.js";
import { createChildLogger } from "../utils/logger.js";
import type { CatalogSnapshot, CatalogStore } from "./catalogStore.js";
import { MaterialNormalizer } from "./materialNormalizer.js";
import { recommendRecipes } from "./recommendation.js";

const log = createChildLogger({ module: "recommendation" });

export type RecommendationServiceOptions = {
  catalog: CatalogStore;
  topN: number;
};

export type ReceiptRecommendation = {
  standardMaterials: string[];
  recommendations: Recommendation[];
};

type PreparedCatalog = {
  snapshot: CatalogSnapshot;
  normalizer: MaterialNormalizer;
};

export class RecommendationService {
  readonly topN: number;

  private readonly catalog: CatalogStore;
  private prepared: Promise<PreparedCatalog> | null = null;

  constructor(options: RecommendationServiceOptions) {
    this.catalog = options.catalog;
    this.topN = options.topN;
  }

  /** Loads the catalog and compiles the normalizer if that has not happened yet. */
  async warmUp(): Promise<CatalogSnapshot> {
    return (await this.prepare()).snapshot;
  }

  async recommendFromLines(lines: readonly string[]): Promise<ReceiptRecommendation> {
    const { snapshot, normalizer } = await this.prepare();
    const materials = normalizer.normalize(lines);
    const recommendations = recommendRecipes(snapshot.recipes, materials, this.topN);

    const standardMaterials = Array.from(materials).sort();
    log.info({
      msg: "Receipt normalized",
      lines: lines.length,
      standardMaterials,
      recommendations: recommendations.length
    });

    return { standardMaterials, recommendations };
  }

  private prepare(): Promise<PreparedCatalog> {
    if (!this.prepared) {
      this.prepared = this.catalog.load().then((snapshot) => ({
        snapshot,
        normalizer: MaterialNormalizer.build(snapshot.mapping)
      }));
    }
    return this.prepared;
  }
}
