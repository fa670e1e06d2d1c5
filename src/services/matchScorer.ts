import type { MatchScore, RequiredMaterials } from "../types/contracts.js";

type MaterialGroups = {
  core: string[];
  optional: string[];
};

const NO_MATCH: MatchScore = { ratio: 0, matched: [], missing: [] };

export function scoreMatch(required: RequiredMaterials, available: ReadonlySet<string>): MatchScore {
  let { core, optional } = splitMaterials(required);

  if (core.length === 0 && optional.length === 0) {
    return { ...NO_MATCH };
  }

  // A recipe that lists only optional materials is judged on them as if they were mandatory.
  if (core.length === 0) {
    core = optional;
    optional = [];
  }

  const allRequired = unique([...core, ...optional]);
  const missing = allRequired.filter((material) => !available.has(material));

  if (core.some((material) => !available.has(material))) {
    return { ratio: 0, matched: [], missing };
  }

  const matched = allRequired.filter((material) => available.has(material));
  return {
    ratio: matched.length / allRequired.length,
    matched,
    missing
  };
}

function splitMaterials(required: RequiredMaterials): MaterialGroups {
  switch (required.kind) {
    case "flat":
      return { core: unique(required.materials), optional: [] };
    case "core_optional":
      return { core: unique(required.core), optional: unique(required.optional) };
  }
}

function unique(values: string[]): string[] {
  return Array.from(new Set(values));
}
