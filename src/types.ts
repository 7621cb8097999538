/** Box corners in original image pixels: [x1, y1, x2, y2]. */
export type BoundingBox = [number, number, number, number];

export interface Detection {
  classId: number;
  confidence: number;
  bbox: BoundingBox;
}

export interface NamedIngredient {
  name: string;
  confidence: number;
  bbox: BoundingBox;
}

export interface RecipeMatch {
  recipeId: number;
  name: string;
  matchCount: number;
  time: number;
  calories: number;
}

export interface RecipeDetail {
  recipeId: number;
  name: string;
  time: number;
  calories: number;
  ingredients: string[];
}

// ============================================================================
// HTTP PAYLOADS
// ============================================================================

export interface ErrorResponse {
  error: string;
  code?: string;
}

export interface UploadImageResponse {
  success: true;
  ingredients: NamedIngredient[];
  /** Annotated image bytes, one latin1 character per byte. */
  annotated_image: string;
  session_ingredients: string[];
}

export interface RecipeMatchPayload {
  recipe_id: number;
  name: string;
  match_count: number;
  time: number;
  calories: number;
}

export interface RecipesResponse {
  ingredients: string[];
  recipes: RecipeMatchPayload[];
}

export type AddIngredientResponse =
  | { success: true; ingredients: string[] }
  | { success: false; error: string };

export interface IngredientsResponse {
  ingredients: string[];
}

export interface RecipeDetailResponse {
  recipe_id: number;
  name: string;
  time: number;
  calories: number;
  ingredients: string[];
}
