import { labelForClass } from "./ingredientLabels.js";
import type { Detection, NamedIngredient } from "./types.js";

/**
 * One ingredient per distinct mapped class. The first detection of a class (input order, not
 * confidence) supplies its confidence and box; classes without a label are dropped.
 */
export function normalizeDetections(
  detections: readonly Detection[],
  labelFor: (classId: number) => string | null = labelForClass,
): NamedIngredient[] {
  const seen = new Set<number>();
  const ingredients: NamedIngredient[] = [];

  for (const detection of detections) {
    if (seen.has(detection.classId)) continue;
    const name = labelFor(detection.classId);
    if (!name) continue;
    seen.add(detection.classId);
    ingredients.push({
      name,
      confidence: detection.confidence,
      bbox: [...detection.bbox],
    });
  }

  return ingredients;
}
