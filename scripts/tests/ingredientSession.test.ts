import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { addIngredient, mergeIngredients } from "../../src/ingredientSession.js";

describe("mergeIngredients", () => {
  it("is the identity for an empty batch", () => {
    const existing = ["tomato", "onion"];
    assert.deepEqual(mergeIngredients(existing, []), ["tomato", "onion"]);
    assert.deepEqual(mergeIngredients([], []), []);
  });

  it("appends new names in detection order and skips known ones", () => {
    assert.deepEqual(mergeIngredients(["tomato"], ["garlic", "tomato", "carrot", "garlic"]), [
      "tomato",
      "garlic",
      "carrot",
    ]);
  });

  it("does not mutate its inputs", () => {
    const existing = ["tomato"];
    const incoming = ["onion"];
    mergeIngredients(existing, incoming);
    assert.deepEqual(existing, ["tomato"]);
    assert.deepEqual(incoming, ["onion"]);
  });

  it("collapses duplicates already present in stored state", () => {
    assert.deepEqual(mergeIngredients(["onion", "onion"], []), ["onion"]);
  });
});

describe("addIngredient", () => {
  it("leaves the set unchanged when the name is present", () => {
    assert.deepEqual(addIngredient(["tomato", "onion"], "onion"), ["tomato", "onion"]);
  });

  it("appends a new name", () => {
    assert.deepEqual(addIngredient(["tomato"], "spinach"), ["tomato", "spinach"]);
  });
});
