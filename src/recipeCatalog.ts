import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";

import { DataAccessError } from "./errors.js";
import type { RecipeDetail } from "./types.js";

export type IngredientRef = { id: number; name: string };

/** One `recipe_ingredients` row joined to its recipe. */
export type RecipeIngredientLink = {
  recipeId: number;
  ingredientId: number;
  name: string;
  time: number;
  calories: number;
};

/**
 * Read access to the recipe database. Implementations throw on failure; the matcher owns the
 * degrade-to-empty policy.
 */
export interface RecipeCatalog {
  findIngredients(names: readonly string[], signal: AbortSignal): Promise<IngredientRef[]>;
  findRecipeLinks(ingredientIds: readonly number[], signal: AbortSignal): Promise<RecipeIngredientLink[]>;
  getRecipeById(recipeId: number, signal: AbortSignal): Promise<RecipeDetail | null>;
}

// ============================================================================
// ROW SCHEMAS
// ============================================================================

const IngredientRowSchema = z.object({
  ingr_id: z.coerce.number().int(),
  ingr_name: z.string(),
});

const RecipeRowSchema = z.object({
  recipe_id: z.coerce.number().int(),
  name: z.string(),
  time: z.coerce.number(),
  calories: z.coerce.number(),
});

// PostgREST embeds a many-to-one relation as an object, but older schemas without the
// foreign key hint return a single-element array.
const EmbeddedRecipeSchema = z.union([
  RecipeRowSchema,
  z.array(RecipeRowSchema).length(1).transform((rows) => rows[0]),
]);

const LinkRowSchema = z.object({
  recipe_id: z.coerce.number().int(),
  ingr_id: z.coerce.number().int(),
  recipes: EmbeddedRecipeSchema,
});

const RecipeDetailRowSchema = RecipeRowSchema.extend({
  recipe_ingredients: z.array(
    z.object({
      ingredients: z.union([
        z.object({ ingr_name: z.string() }),
        z.array(z.object({ ingr_name: z.string() })),
      ]).nullable(),
    }),
  ),
});

function parseRows<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, stage: string): T[] {
  const parsed = z.array(schema).safeParse(data ?? []);
  if (!parsed.success) {
    throw new DataAccessError(stage, "Unexpected row shape", parsed.error);
  }
  return parsed.data;
}

// ============================================================================
// SUPABASE CATALOG
// ============================================================================

export function createSupabaseRecipeCatalog(client: SupabaseClient): RecipeCatalog {
  return {
    async findIngredients(names, signal) {
      const { data, error } = await client
        .from("ingredients")
        .select("ingr_id, ingr_name")
        .in("ingr_name", [...names])
        .abortSignal(signal);

      if (error) {
        throw new DataAccessError("resolve_ingredients", error.message, error);
      }
      return parseRows(IngredientRowSchema, data, "resolve_ingredients").map((row) => ({
        id: row.ingr_id,
        name: row.ingr_name,
      }));
    },

    async findRecipeLinks(ingredientIds, signal) {
      const { data, error } = await client
        .from("recipe_ingredients")
        .select("recipe_id, ingr_id, recipes!inner(recipe_id, name, time, calories)")
        .in("ingr_id", [...ingredientIds])
        .abortSignal(signal);

      if (error) {
        throw new DataAccessError("recipe_links", error.message, error);
      }
      return parseRows(LinkRowSchema, data, "recipe_links").map((row) => ({
        recipeId: row.recipe_id,
        ingredientId: row.ingr_id,
        name: row.recipes.name,
        time: row.recipes.time,
        calories: row.recipes.calories,
      }));
    },

    async getRecipeById(recipeId, signal) {
      const { data, error } = await client
        .from("recipes")
        .select("recipe_id, name, time, calories, recipe_ingredients(ingredients(ingr_name))")
        .eq("recipe_id", recipeId)
        .abortSignal(signal)
        .maybeSingle();

      if (error) {
        throw new DataAccessError("recipe_detail", error.message, error);
      }
      if (!data) return null;

      const [row] = parseRows(RecipeDetailRowSchema, [data], "recipe_detail");
      const ingredients = row.recipe_ingredients.flatMap((link) => {
        if (!link.ingredients) return [];
        return Array.isArray(link.ingredients)
          ? link.ingredients.map((entry) => entry.ingr_name)
          : [link.ingredients.ingr_name];
      });

      return {
        recipeId: row.recipe_id,
        name: row.name,
        time: row.time,
        calories: row.calories,
        ingredients: [...new Set(ingredients)],
      };
    },
  };
}
