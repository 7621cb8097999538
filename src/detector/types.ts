import type { Detection } from "../types.js";

export interface IngredientDetector {
  detect(image: Buffer): Promise<Detection[]>;
  /** Draws boxes on `image`; runs detection first unless `detections` are supplied. */
  annotate(image: Buffer, detections?: readonly Detection[]): Promise<Buffer>;
}

export interface ModelOutput {
  data: Float32Array;
  shape: number[];
}

/** A loaded model that maps a square RGB input (HWC, values in [0,1]) to raw YOLO output. */
export interface InferenceModel {
  readonly inputSize: number;
  predict(input: Float32Array): Promise<ModelOutput>;
}
