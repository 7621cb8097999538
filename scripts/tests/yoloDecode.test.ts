import assert from "node:assert/strict";
import { describe, it } from "node:test";

import type { ModelOutput } from "../../src/detector/types.js";
import { computeLetterbox, decodeYoloOutput, iou, nonMaxSuppression } from "../../src/detector/yoloDecode.js";

/** Each anchor row is [cx, cy, w, h, ...classScores]; the head stores them channel-major. */
const buildOutput = (anchors: number[][]): ModelOutput => {
  const channels = anchors[0].length;
  const count = anchors.length;
  const data = new Float32Array(channels * count);
  anchors.forEach((values, anchor) => {
    values.forEach((value, channel) => {
      data[channel * count + anchor] = value;
    });
  });
  return { data, shape: [1, channels, count] };
};

const options = { confidenceThreshold: 0.25, iouThreshold: 0.45, maxDetections: 100 };
// 200x100 image letterboxed into a 100px square: scale 0.5, 25px bands top and bottom.
const letterbox = computeLetterbox(200, 100, 100);

describe("computeLetterbox", () => {
  it("centres a wide image vertically", () => {
    assert.deepEqual(letterbox, { scale: 0.5, padX: 0, padY: 25, width: 200, height: 100 });
  });

  it("centres a tall image horizontally", () => {
    assert.deepEqual(computeLetterbox(50, 100, 100), { scale: 1, padX: 25, padY: 0, width: 50, height: 100 });
  });
});

describe("decodeYoloOutput", () => {
  it("maps the best class and box back to original pixels", () => {
    const output = buildOutput([[50, 50, 40, 20, 0.1, 0.9, 0.2]]);

    assert.deepEqual(decodeYoloOutput(output, letterbox, options), [
      { classId: 1, confidence: 0.9, bbox: [60, 30, 140, 70] },
    ]);
  });

  it("drops anchors under the confidence threshold", () => {
    const output = buildOutput([
      [50, 50, 40, 20, 0.1, 0.1, 0.2],
      [20, 50, 10, 10, 0, 0, 0],
    ]);

    assert.deepEqual(decodeYoloOutput(output, letterbox, options), []);
  });

  it("suppresses overlapping boxes of the same class only", () => {
    const output = buildOutput([
      [50, 50, 40, 20, 0, 0.9, 0],
      [52, 50, 40, 20, 0, 0.6, 0],
      [52, 50, 40, 20, 0, 0, 0.6],
    ]);

    assert.deepEqual(decodeYoloOutput(output, letterbox, options), [
      { classId: 1, confidence: 0.9, bbox: [60, 30, 140, 70] },
      { classId: 2, confidence: 0.6, bbox: [64, 30, 144, 70] },
    ]);
  });

  it("clamps boxes to the image", () => {
    const output = buildOutput([[95, 30, 20, 20, 0.8, 0, 0]]);

    assert.deepEqual(decodeYoloOutput(output, letterbox, options), [
      { classId: 0, confidence: 0.8, bbox: [170, 0, 200, 30] },
    ]);
  });

  it("caps the number of detections", () => {
    const output = buildOutput([
      [10, 50, 10, 10, 0.5, 0, 0],
      [50, 50, 10, 10, 0.7, 0, 0],
      [90, 50, 10, 10, 0.6, 0, 0],
    ]);

    const detections = decodeYoloOutput(output, letterbox, { ...options, maxDetections: 2 });
    assert.deepEqual(
      detections.map((detection) => detection.confidence),
      [0.7, 0.6],
    );
  });

  it("rejects output of the wrong shape", () => {
    assert.throws(
      () => decodeYoloOutput({ data: new Float32Array(8), shape: [1, 4, 2] }, letterbox, options),
      /Unexpected model output shape \[1, 4, 2\]/,
    );
    assert.throws(
      () => decodeYoloOutput({ data: new Float32Array(5), shape: [1, 6, 1] }, letterbox, options),
      /has 5 values, expected 6/,
    );
  });
});

describe("iou / nonMaxSuppression", () => {
  it("computes intersection over union", () => {
    assert.equal(iou([0, 0, 10, 10], [5, 0, 15, 10]), 50 / 150);
    assert.equal(iou([0, 0, 10, 10], [20, 20, 30, 30]), 0);
  });

  it("keeps the most confident of overlapping boxes", () => {
    const kept = nonMaxSuppression(
      [
        { classId: 0, confidence: 0.4, bbox: [0, 0, 10, 10] },
        { classId: 0, confidence: 0.8, bbox: [1, 0, 11, 10] },
        { classId: 0, confidence: 0.5, bbox: [50, 50, 60, 60] },
      ],
      0.45,
      10,
    );

    assert.deepEqual(
      kept.map((detection) => detection.confidence),
      [0.8, 0.5],
    );
  });
});
