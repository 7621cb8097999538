import { normalizeDetections } from "./detectionNormalizer.js";
import type { IngredientDetector } from "./detector/types.js";
import {
  describeError,
  DetectionError,
  isScanPipelineError,
  NoIngredientsDetectedError,
  type ScanErrorKind,
} from "./errors.js";
import { mergeIngredients } from "./ingredientSession.js";
import { incrementMetric } from "./metrics.js";
import type { NamedIngredient } from "./types.js";

export type ScanOutcome =
  | {
      status: "ok";
      ingredients: NamedIngredient[];
      annotatedImage: Buffer;
      /** Session set after merging the detected names; the caller persists it. */
      sessionIngredients: string[];
    }
  | {
      status: "failed";
      kind: Exclude<ScanErrorKind, "data_access_error">;
      message: string;
    };

const FAILURE_METRIC = {
  decode_error: "scan_decode_failed",
  detection_error: "scan_detection_failed",
  no_ingredients_detected: "scan_no_ingredients",
} as const;

/**
 * Detect ingredients in an uploaded image and fold them into the session set.
 * Never throws: every failure comes back as a `failed` outcome carrying its kind.
 */
export async function scanImage(
  detector: IngredientDetector,
  image: Buffer,
  existingIngredients: readonly string[],
): Promise<ScanOutcome> {
  try {
    const detections = await detector.detect(image);
    console.log(`[Scan] ${detections.length} raw detection(s)`);

    const ingredients = normalizeDetections(detections);
    if (!ingredients.length) {
      throw new NoIngredientsDetectedError();
    }

    const annotatedImage = await detector.annotate(image, detections);
    const sessionIngredients = mergeIngredients(
      existingIngredients,
      ingredients.map((ingredient) => ingredient.name),
    );

    incrementMetric("scan_success");
    console.log(`[Scan] Detected ${ingredients.map((ingredient) => ingredient.name).join(", ")}`);
    return { status: "ok", ingredients, annotatedImage, sessionIngredients };
  } catch (error) {
    const failure = isScanPipelineError(error) ? error : new DetectionError("Error processing image", error, "scan");
    const kind = failure.kind === "data_access_error" ? "detection_error" : failure.kind;

    incrementMetric(FAILURE_METRIC[kind]);
    console.warn(`[Scan] stage=${failure.stage} kind=${kind}: ${describeError(failure)}`);
    return { status: "failed", kind, message: failure.message };
  }
}
