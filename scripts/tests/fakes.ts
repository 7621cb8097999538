import { createClient } from "@supabase/supabase-js";

import type { IngredientDetector } from "../../src/detector/types.js";
import type { IngredientRef, RecipeCatalog, RecipeIngredientLink } from "../../src/recipeCatalog.js";
import type { Detection, RecipeDetail } from "../../src/types.js";

export type FixtureRecipe = { recipeId: number; name: string; time: number; calories: number };

export type CatalogFixture = {
  ingredients: IngredientRef[];
  recipes: FixtureRecipe[];
  links: Array<{ recipeId: number; ingredientId: number }>;
};

/**
 * Recipe tables held in memory. Queries behave like the `in` filters of the Supabase catalog.
 */
export class InMemoryRecipeCatalog implements RecipeCatalog {
  calls = 0;

  constructor(private readonly fixture: CatalogFixture) {}

  async findIngredients(names: readonly string[]): Promise<IngredientRef[]> {
    this.calls += 1;
    return this.fixture.ingredients.filter((ingredient) => names.includes(ingredient.name));
  }

  async findRecipeLinks(ingredientIds: readonly number[]): Promise<RecipeIngredientLink[]> {
    this.calls += 1;
    return this.fixture.links
      .filter((link) => ingredientIds.includes(link.ingredientId))
      .flatMap((link) => {
        const recipe = this.fixture.recipes.find((candidate) => candidate.recipeId === link.recipeId);
        return recipe ? [{ ...recipe, ingredientId: link.ingredientId }] : [];
      });
  }

  async getRecipeById(recipeId: number): Promise<RecipeDetail | null> {
    this.calls += 1;
    const recipe = this.fixture.recipes.find((candidate) => candidate.recipeId === recipeId);
    if (!recipe) return null;
    const ingredients = this.fixture.links
      .filter((link) => link.recipeId === recipeId)
      .flatMap((link) => this.fixture.ingredients.filter((ingredient) => ingredient.id === link.ingredientId))
      .map((ingredient) => ingredient.name);
    return { ...recipe, ingredients };
  }
}

/** Catalog whose every call fails the way a dropped connection would. */
export class FailingRecipeCatalog implements RecipeCatalog {
  async findIngredients(): Promise<IngredientRef[]> {
    throw new Error("connect ECONNREFUSED 127.0.0.1:5432");
  }

  async findRecipeLinks(): Promise<RecipeIngredientLink[]> {
    throw new Error("connect ECONNREFUSED 127.0.0.1:5432");
  }

  async getRecipeById(): Promise<RecipeDetail | null> {
    throw new Error("connect ECONNREFUSED 127.0.0.1:5432");
  }
}

export class StubDetector implements IngredientDetector {
  detectCalls = 0;
  annotateCalls: Array<readonly Detection[] | undefined> = [];

  constructor(
    private readonly detections: Detection[] | Error,
    private readonly annotated: Buffer | Error = Buffer.from("annotated"),
  ) {}

  async detect(): Promise<Detection[]> {
    this.detectCalls += 1;
    if (this.detections instanceof Error) throw this.detections;
    return this.detections;
  }

  async annotate(_image: Buffer, detections?: readonly Detection[]): Promise<Buffer> {
    this.annotateCalls.push(detections);
    if (this.annotated instanceof Error) throw this.annotated;
    return this.annotated;
  }
}

/** Ingredients, recipes and links shared by matcher and HTTP tests. */
export const RECIPE_FIXTURE: CatalogFixture = {
  ingredients: [
    { id: 1, name: "tomato" },
    { id: 2, name: "onion" },
    { id: 3, name: "garlic" },
    { id: 4, name: "carrot" },
  ],
  recipes: [
    { recipeId: 10, name: "Tomato onion salad", time: 15, calories: 180 },
    { recipeId: 11, name: "Tomato soup", time: 30, calories: 220 },
    { recipeId: 12, name: "Garlic carrots", time: 20, calories: 150 },
  ],
  links: [
    { recipeId: 10, ingredientId: 1 },
    { recipeId: 10, ingredientId: 2 },
    { recipeId: 11, ingredientId: 1 },
    { recipeId: 12, ingredientId: 3 },
    { recipeId: 12, ingredientId: 4 },
  ],
};

export type RecordedRequest = { method: string; url: URL; body: unknown };
export type FakeReply = { status: number; body?: unknown };

/**
 * Supabase client whose HTTP traffic goes to `reply` instead of the network. Every request is
 * recorded so tests can assert on the PostgREST filters that were sent.
 */
export function createFakeSupabase(reply: (request: RecordedRequest) => FakeReply) {
  const requests: RecordedRequest[] = [];

  const fakeFetch: typeof fetch = async (input, init) => {
    const request: RecordedRequest = {
      method: init?.method ?? "GET",
      url: new URL(input instanceof Request ? input.url : String(input)),
      body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined,
    };
    requests.push(request);
    const { status, body } = reply(request);
    return new Response(body === undefined ? "" : JSON.stringify(body), {
      status,
      headers: { "content-type": "application/json" },
    });
  };

  const client = createClient("http://supabase.test", "test-service-role-key", {
    auth: { persistSession: false, autoRefreshToken: false },
    global: { fetch: fakeFetch },
  });

  return { client, requests };
}
