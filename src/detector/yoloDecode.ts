import type { BoundingBox, Detection } from "../types.js";
import type { ModelOutput } from "./types.js";

export type DecodeOptions = {
  confidenceThreshold: number;
  iouThreshold: number;
  maxDetections: number;
};

/** Where the original image sits inside the square model input. */
export type Letterbox = {
  scale: number;
  padX: number;
  padY: number;
  width: number;
  height: number;
};

export function computeLetterbox(width: number, height: number, inputSize: number): Letterbox {
  const scale = Math.min(inputSize / width, inputSize / height);
  const scaledWidth = Math.round(width * scale);
  const scaledHeight = Math.round(height * scale);
  return {
    scale,
    padX: Math.floor((inputSize - scaledWidth) / 2),
    padY: Math.floor((inputSize - scaledHeight) / 2),
    width,
    height,
  };
}

const clamp = (value: number, min: number, max: number) => Math.min(Math.max(value, min), max);
const round2 = (value: number) => Math.round(value * 100) / 100;
const round4 = (value: number) => Math.round(value * 10_000) / 10_000;

export function iou(a: BoundingBox, b: BoundingBox): number {
  const x1 = Math.max(a[0], b[0]);
  const y1 = Math.max(a[1], b[1]);
  const x2 = Math.min(a[2], b[2]);
  const y2 = Math.min(a[3], b[3]);
  const intersection = Math.max(0, x2 - x1) * Math.max(0, y2 - y1);
  if (intersection === 0) return 0;
  const areaA = (a[2] - a[0]) * (a[3] - a[1]);
  const areaB = (b[2] - b[0]) * (b[3] - b[1]);
  return intersection / (areaA + areaB - intersection);
}

/**
 * Greedy per-class NMS. Input order does not matter; output is sorted by confidence, highest first.
 */
export function nonMaxSuppression(
  candidates: readonly Detection[],
  iouThreshold: number,
  maxDetections: number,
): Detection[] {
  const sorted = [...candidates].sort((a, b) => b.confidence - a.confidence);
  const kept: Detection[] = [];

  for (const candidate of sorted) {
    if (kept.length >= maxDetections) break;
    const overlaps = kept.some(
      (existing) => existing.classId === candidate.classId && iou(existing.bbox, candidate.bbox) > iouThreshold,
    );
    if (!overlaps) kept.push(candidate);
  }

  return kept;
}

/**
 * Decode a YOLOv8 detection head `[1, 4 + classes, anchors]` (cx, cy, w, h, then one score per
 * class) into detections in original image pixels.
 */
export function decodeYoloOutput(output: ModelOutput, letterbox: Letterbox, options: DecodeOptions): Detection[] {
  const [batch, channels, anchors] = output.shape;
  if (output.shape.length !== 3 || batch !== 1 || channels <= 4) {
    throw new Error(`Unexpected model output shape [${output.shape.join(", ")}]`);
  }
  if (output.data.length !== channels * anchors) {
    throw new Error(`Model output has ${output.data.length} values, expected ${channels * anchors}`);
  }

  const { data } = output;
  const classCount = channels - 4;
  const at = (channel: number, anchor: number) => data[channel * anchors + anchor];
  const candidates: Detection[] = [];

  for (let anchor = 0; anchor < anchors; anchor += 1) {
    let classId = -1;
    let confidence = 0;
    for (let cls = 0; cls < classCount; cls += 1) {
      const score = at(4 + cls, anchor);
      if (score > confidence) {
        confidence = score;
        classId = cls;
      }
    }
    if (classId < 0 || confidence < options.confidenceThreshold) continue;

    const cx = at(0, anchor);
    const cy = at(1, anchor);
    const w = at(2, anchor);
    const h = at(3, anchor);
    const toX = (x: number) => round2(clamp((x - letterbox.padX) / letterbox.scale, 0, letterbox.width));
    const toY = (y: number) => round2(clamp((y - letterbox.padY) / letterbox.scale, 0, letterbox.height));

    candidates.push({
      classId,
      confidence: round4(confidence),
      bbox: [toX(cx - w / 2), toY(cy - h / 2), toX(cx + w / 2), toY(cy + h / 2)],
    });
  }

  return nonMaxSuppression(candidates, options.iouThreshold, options.maxDetections);
}
