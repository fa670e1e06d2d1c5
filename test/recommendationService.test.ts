import test, { after } from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { CatalogStore, type CatalogSnapshot } from "../src/services/catalogStore.js";
import { RecommendationService } from "../src/services/recommendationService.js";

const workDir = mkdtempSync(path.join(tmpdir(), "recommendation-service-"));
after(() => rmSync(workDir, { recursive: true, force: true }));

const recipesPath = path.join(workDir, "recipes.json");
const mappingsPath = path.join(workDir, "mappings.json");

writeFileSync(
  recipesPath,
  JSON.stringify([
    { name: "김치찌개", materials: { core: ["김치", "돼지고기"], optional: ["두부"] } },
    { name: "두부부침", materials: ["두부"] }
  ])
);
writeFileSync(
  mappingsPath,
  JSON.stringify([
    { item: "포기김치", material: "김치" },
    { item: "삼겹살", material: "돼지고기" },
    { item: "두부", material: "두부" }
  ])
);

class CountingCatalogStore extends CatalogStore {
  loads = 0;

  load(): Promise<CatalogSnapshot> {
    this.loads += 1;
    return super.load();
  }
}

test("recommendFromLines loads the catalog once without an explicit warm-up", async () => {
  const catalog = new CountingCatalogStore({ dbPath: ":memory:", recipesPath, mappingsPath });
  const service = new RecommendationService({ catalog, topN: 5 });

  const [first, second] = await Promise.all([
    service.recommendFromLines(["포기김치 1kg", "삼겹살 600g"]),
    service.recommendFromLines(["두부 한모"])
  ]);
  await service.warmUp();

  assert.equal(catalog.loads, 1);
  assert.deepEqual(first.standardMaterials, ["김치", "돼지고기"]);
  assert.deepEqual(
    first.recommendations.map((item) => [item.name, item.matchRatio, item.missingMaterials]),
    [["김치찌개", 66, ["두부"]]]
  );
  assert.deepEqual(second.standardMaterials, ["두부"]);
  assert.deepEqual(
    second.recommendations.map((item) => item.name),
    ["두부부침"]
  );
});

test("warmUp returns the loaded snapshot", async () => {
  const catalog = new CatalogStore({ dbPath: ":memory:", recipesPath, mappingsPath });
  const service = new RecommendationService({ catalog, topN: 5 });

  const snapshot = await service.warmUp();

  assert.equal(snapshot.source, "storage");
  assert.equal(snapshot.recipes.length, 2);
  assert.equal(await catalog.load(), snapshot);
});
