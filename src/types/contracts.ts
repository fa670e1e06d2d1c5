export type RequiredMaterials =
  | { kind: "flat"; materials: string[] }
  | { kind: "core_optional"; core: string[]; optional: string[] };

export type Recipe = {
  id: number;
  name: string;
  requiredMaterials: RequiredMaterials;
  steps?: string;
  imageURL?: string;
};

export type MatchScore = {
  ratio: number;
  matched: string[];
  missing: string[];
};

export type Recommendation = {
  name: string;
  imageURL?: string;
  matchRatio: number;
  matchedMaterials: string[];
  missingMaterials: string[];
  missingCount: number;
  steps?: string;
};

// Seed file shapes (data/recipes.json, data/mappings.json)

export type RecipeSeed = {
  name: string;
  materials: string[] | { core?: string[]; optional?: string[] };
  steps?: string;
  image_url?: string;
};

export type MappingSeed = {
  item: string;
  material: string;
};

// HTTP wire shapes

export type RecommendationPayload = {
  name: string;
  match_ratio: number;
  matched: string[];
  missing: string[];
  missing_count: number;
  image_url?: string;
  steps?: string;
};

export type RecommendResponse = {
  status: "success";
  standard_materials: string[];
  recommendations: RecommendationPayload[];
  ocr_lines?: string[];
};

export type ErrorResponse = {
  status: "error";
  error: string;
  message: string;
};
