/**
 * Class ids emitted by the ingredient detection model, mapped to the ingredient names stored
 * in the `ingredients` table. "patato" matches the training data and the recipe database.
 */
export const INGREDIENT_LABELS: ReadonlyMap<number, string> = new Map([
  [0, "aubergine"],
  [1, "cabbage"],
  [2, "carrot"],
  [3, "cauliflower"],
  [4, "garlic"],
  [5, "green-pepper"],
  [6, "onion"],
  [7, "patato"],
  [8, "spinach"],
  [9, "tomato"],
]);

export const labelForClass = (classId: number): string | null => INGREDIENT_LABELS.get(classId) ?? null;
