import test, { after } from "node:test";
import assert from "node:assert/strict";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { CatalogDatabase, loadSqlJs, type CatalogSeed } from "../src/services/catalogDatabase.js";
import { CatalogStore } from "../src/services/catalogStore.js";

// ── helpers ────────────────────────────────────────────────────────────────

const workDir = mkdtempSync(path.join(tmpdir(), "catalog-store-"));
after(() => rmSync(workDir, { recursive: true, force: true }));

let caseCounter = 0;

const seed: CatalogSeed = {
  recipes: [
    {
      name: "김치찌개",
      materials: { core: ["김치", "돼지고기"], optional: ["두부"] },
      steps: "볶고 끓인다",
      image_url: "https://images.example.com/kimchi.jpg"
    },
    { name: "감자조림", materials: ["감자", "양파"] }
  ],
  mappings: [
    { item: "포기김치", material: "김치" },
    { item: "삼겹살", material: "돼지고기" },
    { item: "두부", material: "두부" },
    { item: "두부", material: "순두부" }
  ]
};

function makeCase(options: { withSeed?: boolean } = {}) {
  const dir = path.join(workDir, `case-${++caseCounter}`);
  mkdirSync(dir, { recursive: true });

  const recipesPath = path.join(dir, "recipes.json");
  const mappingsPath = path.join(dir, "mappings.json");
  if (options.withSeed !== false) {
    writeFileSync(recipesPath, JSON.stringify(seed.recipes));
    writeFileSync(mappingsPath, JSON.stringify(seed.mappings));
  }

  return { recipesPath, mappingsPath, dbPath: path.join(dir, "catalog.sqlite") };
}

// ── load ───────────────────────────────────────────────────────────────────

test("load seeds a missing database from the JSON files", async () => {
  const paths = makeCase();
  const store = new CatalogStore(paths);

  const snapshot = await store.load();

  assert.equal(snapshot.source, "storage");
  assert.deepEqual(
    snapshot.recipes.map((recipe) => recipe.name),
    ["김치찌개", "감자조림"]
  );
  assert.deepEqual(snapshot.recipes[0]?.requiredMaterials, {
    kind: "core_optional",
    core: ["김치", "돼지고기"],
    optional: ["두부"]
  });
  assert.equal(snapshot.recipes[0]?.steps, "볶고 끓인다");
  assert.equal(snapshot.recipes[0]?.imageURL, "https://images.example.com/kimchi.jpg");
  assert.deepEqual(snapshot.recipes[1]?.requiredMaterials, { kind: "flat", materials: ["감자", "양파"] });
  assert.equal(snapshot.recipes[1]?.steps, undefined);
  assert.equal(snapshot.recipes[1]?.imageURL, undefined);
});

test("load keeps the first mapping for a duplicated receipt item", async () => {
  const paths = makeCase();
  const store = new CatalogStore(paths);

  const mapping = await store.getMapping();

  assert.equal(mapping.size, 3);
  assert.equal(mapping.get("두부"), "두부");
  assert.equal(mapping.get("포기김치"), "김치");
});

test("load is idempotent", async () => {
  const paths = makeCase();
  const store = new CatalogStore(paths);

  assert.equal(store.isLoaded, false);
  const first = await store.load();
  const second = await store.load();

  assert.equal(store.isLoaded, true);
  assert.equal(first, second);
  assert.equal(await store.getRecipes(), first.recipes);
});

test("load reads an existing database without touching the seed files", async () => {
  const paths = makeCase();
  await new CatalogStore(paths).load();
  rmSync(paths.recipesPath);
  rmSync(paths.mappingsPath);

  const snapshot = await new CatalogStore(paths).load();

  assert.equal(snapshot.source, "storage");
  assert.equal(snapshot.recipes.length, 2);
  assert.equal(snapshot.mapping.size, 3);
});

test("load falls back to a placeholder catalog when seed files are missing", async () => {
  const paths = makeCase({ withSeed: false });
  const store = new CatalogStore(paths);

  const snapshot = await store.load();

  assert.equal(snapshot.source, "placeholder");
  assert.equal(snapshot.recipes.length, 1);
  assert.equal(snapshot.recipes[0]?.name, "샘플 김치찌개");
  assert.deepEqual(snapshot.recipes[0]?.requiredMaterials, {
    kind: "core_optional",
    core: ["김치"],
    optional: ["두부"]
  });
  assert.deepEqual(Array.from(snapshot.mapping.entries()), [["샘플김치", "김치"]]);
});

test("load skips a recipe whose materials cannot be parsed", async () => {
  const paths = makeCase();
  const db = await CatalogDatabase.open(paths.dbPath);
  db.reset(seed);
  db.close();

  const SQL = await loadSqlJs();
  const raw = new SQL.Database(readFileSync(paths.dbPath));
  raw.run("INSERT INTO Recipes (name, required_materials) VALUES (?, ?)", ["깨진 레시피", "{not json"]);
  writeFileSync(paths.dbPath, raw.export());
  raw.close();

  const snapshot = await new CatalogStore(paths).load();

  assert.deepEqual(
    snapshot.recipes.map((recipe) => recipe.name),
    ["김치찌개", "감자조림"]
  );
});

test("load reseeds a database whose tables are empty", async () => {
  const paths = makeCase();
  const db = await CatalogDatabase.open(paths.dbPath);
  db.reset({ recipes: [], mappings: [] });
  db.close();

  const snapshot = await new CatalogStore(paths).load();

  assert.equal(snapshot.source, "storage");
  assert.equal(snapshot.recipes.length, 2);
});

test("load replaces a corrupt database file from the seed files", async () => {
  const paths = makeCase();
  writeFileSync(paths.dbPath, "this is not a sqlite database ".repeat(20));

  const snapshot = await new CatalogStore(paths).load();

  assert.equal(snapshot.source, "storage");
  assert.equal(snapshot.recipes.length, 2);
  assert.equal(snapshot.mapping.size, 3);

  const reopened = await new CatalogStore(paths).load();
  assert.equal(reopened.source, "storage");
  assert.deepEqual(
    reopened.recipes.map((recipe) => recipe.name),
    ["김치찌개", "감자조림"]
  );
});

test("load leaves the catalog empty when an unreadable database cannot be replaced", async () => {
  const paths = makeCase();
  mkdirSync(paths.dbPath);
  writeFileSync(path.join(paths.dbPath, "keep"), "occupied");

  const store = new CatalogStore(paths);
  const snapshot = await store.load();

  assert.equal(snapshot.source, "empty");
  assert.equal(snapshot.recipes.length, 0);
  assert.equal(snapshot.mapping.size, 0);
  assert.equal(store.isLoaded, true);
  assert.ok(existsSync(path.join(paths.dbPath, "keep")));
});

test("concurrent first loads share one snapshot", async () => {
  const paths = makeCase();
  const store = new CatalogStore(paths);

  const [first, second] = await Promise.all([store.load(), store.load()]);

  assert.equal(first, second);
  assert.equal(first.source, "storage");
});

test("load works against an in-memory database", async () => {
  const paths = makeCase();
  const snapshot = await new CatalogStore({ ...paths, dbPath: ":memory:" }).load();

  assert.equal(snapshot.source, "storage");
  assert.equal(snapshot.recipes.length, 2);
});

// ── CatalogDatabase.reset ──────────────────────────────────────────────────

test("reset inserts mappings with insert-or-ignore semantics", async () => {
  const db = await CatalogDatabase.open(":memory:");

  const result = db.reset(seed);

  assert.deepEqual(result, { recipes: 2, mappings: 3, skippedMappings: 1 });
  assert.deepEqual(db.readMappings(), [
    { receipt_item: "포기김치", standard_material: "김치" },
    { receipt_item: "삼겹살", standard_material: "돼지고기" },
    { receipt_item: "두부", standard_material: "두부" }
  ]);
  assert.equal(db.readRecipes()[0]?.required_materials, '{"core":["김치","돼지고기"],"optional":["두부"]}');
  db.close();
});

test("reset writes the database file it was opened from", async () => {
  const paths = makeCase();
  const db = await CatalogDatabase.open(paths.dbPath);
  db.reset(seed);
  db.close();

  const reopened = await CatalogDatabase.open(paths.dbPath);

  assert.equal(reopened.hasSchema(), true);
  assert.deepEqual(
    reopened.readRecipes().map((row) => [row.recipe_id, row.name, row.steps, row.image_url]),
    [
      [1, "김치찌개", "볶고 끓인다", "https://images.example.com/kimchi.jpg"],
      [2, "감자조림", null, null]
    ]
  );
  reopened.close();
});

test("reset replaces earlier contents", async () => {
  const db = await CatalogDatabase.open(":memory:");
  db.reset(seed);

  db.reset({ recipes: [{ name: "계란말이", materials: { core: ["계란"] } }], mappings: [{ item: "특란", material: "계란" }] });

  assert.deepEqual(
    db.readRecipes().map((row) => row.name),
    ["계란말이"]
  );
  assert.equal(db.readMappings().length, 1);
  db.close();
});
