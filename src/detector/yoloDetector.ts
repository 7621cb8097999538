import sharp from "sharp";

import { DecodeError, DetectionError } from "../errors.js";
import { BulkheadTimeoutError, Semaphore, TimeoutError, withTimeout } from "../resilience.js";
import type { Detection } from "../types.js";
import { renderAnnotationSvg, resolveOutputFormat } from "./annotate.js";
import type { IngredientDetector, InferenceModel, ModelOutput } from "./types.js";
import { computeLetterbox, decodeYoloOutput, type DecodeOptions, type Letterbox } from "./yoloDecode.js";

export type YoloDetectorOptions = DecodeOptions & {
  inferenceTimeoutMs: number;
  concurrency: number;
  labelFor?: (classId: number) => string | null;
};

type PreparedImage = {
  input: Float32Array;
  letterbox: Letterbox;
};

const LETTERBOX_FILL = { r: 114, g: 114, b: 114 };

/**
 * YOLO detector over a preloaded model. The model is never mutated after load, so one instance
 * serves every request; the semaphore only bounds how many inferences run at once.
 */
export class YoloDetector implements IngredientDetector {
  private readonly bulkhead: Semaphore;

  constructor(
    private readonly model: InferenceModel,
    private readonly options: YoloDetectorOptions,
  ) {
    this.bulkhead = new Semaphore(options.concurrency);
  }

  async detect(image: Buffer): Promise<Detection[]> {
    const prepared = await this.prepare(image);
    const output = await this.infer(prepared.input);

    try {
      return decodeYoloOutput(output, prepared.letterbox, this.options);
    } catch (error) {
      throw new DetectionError("Unexpected model output", error, "postprocess");
    }
  }

  async annotate(image: Buffer, detections?: readonly Detection[]): Promise<Buffer> {
    const boxes = detections ?? (await this.detect(image));

    let width: number;
    let height: number;
    let format: string | undefined;
    try {
      const metadata = await sharp(image).metadata();
      if (!metadata.width || !metadata.height) {
        throw new Error("Image has no dimensions");
      }
      width = metadata.width;
      height = metadata.height;
      format = metadata.format;
    } catch (error) {
      throw new DecodeError(undefined, error);
    }

    const svg = renderAnnotationSvg(boxes, width, height, (classId) => this.labelFor(classId));
    try {
      return await sharp(image)
        .composite([{ input: Buffer.from(svg), top: 0, left: 0 }])
        .toFormat(resolveOutputFormat(format))
        .toBuffer();
    } catch (error) {
      throw new DetectionError("Error creating annotated image", error, "annotate");
    }
  }

  private labelFor(classId: number): string {
    return this.options.labelFor?.(classId) ?? `class ${classId}`;
  }

  private async prepare(image: Buffer): Promise<PreparedImage> {
    if (!image.length) {
      throw new DecodeError("Uploaded image is empty");
    }

    const size = this.model.inputSize;
    try {
      const metadata = await sharp(image).metadata();
      if (!metadata.width || !metadata.height) {
        throw new Error("Image has no dimensions");
      }

      const { data, info } = await sharp(image)
        .resize(size, size, { fit: "contain", background: LETTERBOX_FILL })
        .removeAlpha()
        .toColourspace("srgb")
        .raw()
        .toBuffer({ resolveWithObject: true });

      if (info.width !== size || info.height !== size || info.channels !== 3) {
        throw new Error(`Unexpected raster ${info.width}x${info.height}x${info.channels}`);
      }

      const input = new Float32Array(data.length);
      for (let i = 0; i < data.length; i += 1) {
        input[i] = data[i] / 255;
      }

      return { input, letterbox: computeLetterbox(metadata.width, metadata.height, size) };
    } catch (error) {
      throw new DecodeError(undefined, error);
    }
  }

  private async infer(input: Float32Array): Promise<ModelOutput> {
    const timeoutMs = this.options.inferenceTimeoutMs;
    try {
      return await this.bulkhead.run(
        () => withTimeout(this.model.predict(input), timeoutMs, "inference"),
        { timeoutMs },
      );
    } catch (error) {
      if (error instanceof BulkheadTimeoutError) {
        throw new DetectionError("Detector is busy, please retry", error);
      }
      if (error instanceof TimeoutError) {
        throw new DetectionError("Ingredient detection timed out", error);
      }
      throw new DetectionError("Error detecting ingredients", error);
    }
  }
}
