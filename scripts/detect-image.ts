import dotenv from "dotenv";
import { readFile, writeFile } from "node:fs/promises";
import { parseArgs } from "node:util";

import { loadConfig } from "../src/config.js";
import { normalizeDetections } from "../src/detectionNormalizer.js";
import { loadGraphModel } from "../src/detector/modelLoader.js";
import { YoloDetector } from "../src/detector/yoloDetector.js";
import { labelForClass } from "../src/ingredientLabels.js";

dotenv.config();

// Usage: tsx scripts/detect-image.ts <image> [--out annotated.jpg]
const run = async () => {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: { out: { type: "string" } },
  });
  const [imagePath] = positionals;
  if (!imagePath) {
    throw new Error("Usage: detect-image <image> [--out annotated.jpg]");
  }

  const config = loadConfig();
  const model = await loadGraphModel(config.detector.modelDir, config.detector.inputSize);
  const detector = new YoloDetector(model, {
    confidenceThreshold: config.detector.confidenceThreshold,
    iouThreshold: config.detector.iouThreshold,
    maxDetections: config.detector.maxDetections,
    inferenceTimeoutMs: config.detector.inferenceTimeoutMs,
    concurrency: 1,
    labelFor: labelForClass,
  });

  const image = await readFile(imagePath);
  const detections = await detector.detect(image);
  const ingredients = normalizeDetections(detections);

  console.log(`${detections.length} detection(s), ${ingredients.length} ingredient(s)`);
  for (const ingredient of ingredients) {
    console.log(`  ${ingredient.name.padEnd(14)} ${ingredient.confidence.toFixed(3)}  [${ingredient.bbox.join(", ")}]`);
  }

  if (values.out) {
    await writeFile(values.out, await detector.annotate(image, detections));
    console.log(`Annotated image written to ${values.out}`);
  }
};

run().catch((error) => {
  console.error("detect-image failed:", error);
  process.exit(1);
});
