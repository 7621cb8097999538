import { DataAccessError, describeError } from "./errors.js";
import { incrementMetric } from "./metrics.js";
import type { IngredientRef, RecipeCatalog, RecipeIngredientLink } from "./recipeCatalog.js";
import { createTimeoutSignal, withTimeout } from "./resilience.js";
import type { RecipeMatch } from "./types.js";

export type MatchOptions = {
  timeoutMs: number;
};

/**
 * Best overlap first, then faster recipes, then lighter ones. Recipe id settles the rest so the
 * order does not depend on row order from the database.
 */
export const compareRecipeMatches = (a: RecipeMatch, b: RecipeMatch): number => {
  if (b.matchCount !== a.matchCount) return b.matchCount - a.matchCount;
  if (a.time !== b.time) return a.time - b.time;
  if (a.calories !== b.calories) return a.calories - b.calories;
  return a.recipeId - b.recipeId;
};

/**
 * Group recipe links by recipe and count the distinct ingredient names each recipe shares with
 * the query. Counting names rather than ids keeps matchCount within the size of the query set
 * when the ingredients table holds the same name twice.
 */
export function groupRecipeMatches(
  links: readonly RecipeIngredientLink[],
  ingredients: readonly IngredientRef[],
): RecipeMatch[] {
  const nameById = new Map(ingredients.map((ingredient): [number, string] => [ingredient.id, ingredient.name]));
  const grouped = new Map<number, { recipe: RecipeIngredientLink; names: Set<string> }>();

  for (const link of links) {
    const ingredientName = nameById.get(link.ingredientId);
    if (ingredientName === undefined) continue;
    const entry = grouped.get(link.recipeId) ?? { recipe: link, names: new Set<string>() };
    entry.names.add(ingredientName);
    grouped.set(link.recipeId, entry);
  }

  return [...grouped.values()]
    .map(({ recipe, names }) => ({
      recipeId: recipe.recipeId,
      name: recipe.name,
      matchCount: names.size,
      time: recipe.time,
      calories: recipe.calories,
    }))
    .sort(compareRecipeMatches);
}

async function queryMatches(
  catalog: RecipeCatalog,
  names: string[],
  signal: AbortSignal,
): Promise<RecipeMatch[]> {
  const ingredients = await catalog.findIngredients(names, signal);
  if (!ingredients.length) return [];

  const ids = [...new Set(ingredients.map((ingredient) => ingredient.id))];
  const links = await catalog.findRecipeLinks(ids, signal);
  return groupRecipeMatches(links, ingredients);
}

/**
 * Recipes sharing at least one ingredient with `ingredientNames`, best match first.
 *
 * Any data-access failure, including the query timeout, is logged and returns an empty list.
 * Callers cannot tell "no matching recipe" from "database unavailable"; that loss is accepted
 * so the recipe page always renders.
 */
export async function matchRecipes(
  catalog: RecipeCatalog,
  ingredientNames: Iterable<string>,
  options: MatchOptions,
): Promise<RecipeMatch[]> {
  const names = [...new Set(ingredientNames)].filter((name) => name.length > 0);
  if (!names.length) return [];

  const { signal, cleanup } = createTimeoutSignal(options.timeoutMs);
  try {
    console.log(`[RecipeMatcher] Searching recipes for ${names.length} ingredient(s): ${names.join(", ")}`);
    const matches = await withTimeout(queryMatches(catalog, names, signal), options.timeoutMs, "recipe match");
    incrementMetric("recipe_match_success");
    console.log(`[RecipeMatcher] Found ${matches.length} recipe(s)`);
    return matches;
  } catch (error) {
    const failure =
      error instanceof DataAccessError ? error : new DataAccessError("recipe_match", "Recipe lookup failed", error);
    incrementMetric("recipe_match_degraded");
    console.warn(`[RecipeMatcher] stage=${failure.stage} degraded to empty: ${describeError(failure)}`);
    return [];
  } finally {
    cleanup();
  }
}
