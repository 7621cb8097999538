import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { createSupabaseRecipeCatalog } from "../../src/recipeCatalog.js";
import { createFakeSupabase } from "./fakes.js";

const signal = new AbortController().signal;

describe("createSupabaseRecipeCatalog", () => {
  it("sends ingredient names as an in filter value, quoting names with separators", async () => {
    const { client, requests } = createFakeSupabase(() => ({
      status: 200,
      body: [{ ingr_id: 1, ingr_name: "tomato" }],
    }));

    const found = await createSupabaseRecipeCatalog(client).findIngredients(["tomato", "salt, pepper"], signal);

    assert.deepEqual(found, [{ id: 1, name: "tomato" }]);
    const [request] = requests;
    assert.equal(request.url.pathname, "/rest/v1/ingredients");
    assert.equal(request.url.searchParams.get("ingr_name"), 'in.(tomato,"salt, pepper")');
  });

  it("joins links to their recipes and coerces numeric columns", async () => {
    const { client, requests } = createFakeSupabase(() => ({
      status: 200,
      body: [
        { recipe_id: "10", ingr_id: 1, recipes: { recipe_id: 10, name: "Tomato soup", time: "30", calories: 220 } },
        { recipe_id: 12, ingr_id: 3, recipes: [{ recipe_id: 12, name: "Garlic carrots", time: 20, calories: 150 }] },
      ],
    }));

    const links = await createSupabaseRecipeCatalog(client).findRecipeLinks([1, 3], signal);

    assert.deepEqual(links, [
      { recipeId: 10, ingredientId: 1, name: "Tomato soup", time: 30, calories: 220 },
      { recipeId: 12, ingredientId: 3, name: "Garlic carrots", time: 20, calories: 150 },
    ]);
    const [request] = requests;
    assert.equal(request.url.pathname, "/rest/v1/recipe_ingredients");
    assert.equal(request.url.searchParams.get("ingr_id"), "in.(1,3)");
    assert.equal(
      request.url.searchParams.get("select"),
      "recipe_id,ingr_id,recipes!inner(recipe_id,name,time,calories)",
    );
  });

  it("raises DataAccessError for PostgREST errors and unexpected rows", async () => {
    const failing = createFakeSupabase(() => ({ status: 500, body: { message: "statement timeout" } }));
    await assert.rejects(createSupabaseRecipeCatalog(failing.client).findIngredients(["tomato"], signal), {
      name: "DataAccessError",
      stage: "resolve_ingredients",
      message: "statement timeout",
    });

    const garbled = createFakeSupabase(() => ({ status: 200, body: [{ ingr_id: "one", ingr_name: "tomato" }] }));
    await assert.rejects(createSupabaseRecipeCatalog(garbled.client).findIngredients(["tomato"], signal), {
      name: "DataAccessError",
      message: "Unexpected row shape",
    });
  });

  it("loads one recipe with distinct ingredient names", async () => {
    const { client, requests } = createFakeSupabase(() => ({
      status: 200,
      body: [
        {
          recipe_id: 10,
          name: "Tomato onion salad",
          time: 15,
          calories: 180,
          recipe_ingredients: [
            { ingredients: { ingr_name: "tomato" } },
            { ingredients: [{ ingr_name: "onion" }] },
            { ingredients: { ingr_name: "tomato" } },
            { ingredients: null },
          ],
        },
      ],
    }));

    const recipe = await createSupabaseRecipeCatalog(client).getRecipeById(10, signal);

    assert.deepEqual(recipe, {
      recipeId: 10,
      name: "Tomato onion salad",
      time: 15,
      calories: 180,
      ingredients: ["tomato", "onion"],
    });
    assert.equal(requests[0].url.searchParams.get("recipe_id"), "eq.10");
  });

  it("returns null for an unknown recipe", async () => {
    const { client } = createFakeSupabase(() => ({ status: 200, body: [] }));

    assert.equal(await createSupabaseRecipeCatalog(client).getRecipeById(99, signal), null);
  });
});
