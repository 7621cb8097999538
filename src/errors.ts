export type ScanErrorKind =
  | "decode_error"
  | "detection_error"
  | "no_ingredients_detected"
  | "data_access_error";

/**
 * Base for failures raised inside the scan pipeline. `stage` names the step that failed
 * and is only ever logged; `message` is short enough to return to the client.
 */
export abstract class ScanPipelineError extends Error {
  abstract readonly kind: ScanErrorKind;
  readonly stage: string;

  constructor(stage: string, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.stage = stage;
  }
}

export class DecodeError extends ScanPipelineError {
  readonly kind = "decode_error";

  constructor(message = "Unable to read the uploaded image", cause?: unknown) {
    super("decode", message, cause);
    this.name = "DecodeError";
  }
}

export class DetectionError extends ScanPipelineError {
  readonly kind = "detection_error";

  constructor(message = "Error detecting ingredients", cause?: unknown, stage = "inference") {
    super(stage, message, cause);
    this.name = "DetectionError";
  }
}

export class NoIngredientsDetectedError extends ScanPipelineError {
  readonly kind = "no_ingredients_detected";

  constructor(message = "No ingredients detected") {
    super("normalize", message);
    this.name = "NoIngredientsDetectedError";
  }
}

export class DataAccessError extends ScanPipelineError {
  readonly kind = "data_access_error";

  constructor(stage: string, message: string, cause?: unknown) {
    super(stage, message, cause);
    this.name = "DataAccessError";
  }
}

export const isScanPipelineError = (error: unknown): error is ScanPipelineError =>
  error instanceof ScanPipelineError;

const HTTP_STATUS_BY_KIND: Record<ScanErrorKind, number> = {
  decode_error: 400,
  detection_error: 500,
  no_ingredients_detected: 400,
  data_access_error: 500,
};

export const httpStatusForKind = (kind: ScanErrorKind): number => HTTP_STATUS_BY_KIND[kind];

const DIAGNOSTIC_MAX_CHARS = 300;

/**
 * One-line `Name: message` for logs, cut to a fixed length. Includes the cause when present.
 */
export function describeError(error: unknown, maxChars = DIAGNOSTIC_MAX_CHARS): string {
  let detail = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
  if (error instanceof Error && error.cause !== undefined) {
    const cause = error.cause instanceof Error ? `${error.cause.name}: ${error.cause.message}` : String(error.cause);
    detail = `${detail} (cause: ${cause})`;
  }
  return detail.length > maxChars ? `${detail.slice(0, maxChars - 3)}...` : detail;
}
