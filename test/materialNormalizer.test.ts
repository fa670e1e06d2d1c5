import test from "node:test";
import assert from "node:assert/strict";
import { MaterialNormalizer } from "../src/services/materialNormalizer.js";

function normalizerFor(entries: Array<[string, string]>): MaterialNormalizer {
  return MaterialNormalizer.build(new Map(entries));
}

test("normalize prefers the longest receipt item at an overlapping position", () => {
  const normalizer = normalizerFor([
    ["삼겹", "pork"],
    ["냉동삼겹살", "frozen_pork"]
  ]);

  assert.deepEqual(normalizer.normalize(["냉동삼겹살 1개"]), new Set(["frozen_pork"]));
});

test("normalize still matches shorter keys where no longer key applies", () => {
  const normalizer = normalizerFor([
    ["냉동삼겹살", "frozen_pork"],
    ["삼겹", "pork"]
  ]);

  assert.deepEqual(normalizer.normalize(["삼겹 500g", "냉동삼겹살 1kg"]), new Set(["pork", "frozen_pork"]));
});

test("normalize collects every occurrence in a line", () => {
  const normalizer = normalizerFor([
    ["김치", "김치"],
    ["포기김치", "김치"],
    ["두부", "두부"],
    ["대파", "대파"]
  ]);

  const materials = normalizer.normalize(["포기김치 두부 대파 각 1개"]);

  assert.deepEqual(materials, new Set(["김치", "두부", "대파"]));
});

test("normalize skips blank lines and lines without known items", () => {
  const normalizer = normalizerFor([["계란", "계란"]]);

  assert.deepEqual(normalizer.normalize(["", "   ", "영수증 번호 0042", "  특란 계란 30구  "]), new Set(["계란"]));
  assert.equal(normalizer.normalize([]).size, 0);
});

test("normalize treats regex metacharacters in keys literally", () => {
  const normalizer = normalizerFor([
    ["C++우유(1L)", "우유"],
    ["a.b", "dot"]
  ]);

  assert.deepEqual(normalizer.normalize(["C++우유(1L) 2,500"]), new Set(["우유"]));
  assert.equal(normalizer.normalize(["axb"]).size, 0);
});

test("normalize returns an empty set for an empty mapping", () => {
  const normalizer = normalizerFor([]);

  assert.equal(normalizer.size, 0);
  assert.equal(normalizer.normalize(["포기김치 1개"]).size, 0);
});

test("normalize is idempotent and independent of line order", () => {
  const normalizer = normalizerFor([
    ["햇반", "밥"],
    ["스팸", "스팸"],
    ["김치", "김치"]
  ]);
  const lines = ["햇반 3입", "스팸 클래식", "종가 김치"];

  const first = normalizer.normalize(lines);
  const second = normalizer.normalize(lines);
  const reversed = normalizer.normalize([...lines].reverse());

  assert.deepEqual(first, second);
  assert.deepEqual(first, reversed);
  assert.deepEqual(first, new Set(["밥", "스팸", "김치"]));
});

test("build copies the mapping it is given", () => {
  const mapping = new Map([["두부", "두부"]]);
  const normalizer = MaterialNormalizer.build(mapping);

  mapping.set("두부", "순두부");

  assert.deepEqual(normalizer.normalize(["찌개두부"]), new Set(["두부"]));
});
