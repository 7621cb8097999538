import { z } from "zod";

const durationMs = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1).optional(),
  MODEL_DIR: z.string().min(1).default("./models/ingredients"),
  MODEL_INPUT_SIZE: z.coerce.number().int().min(32).max(2048).default(640),
  DETECTION_CONFIDENCE: z.coerce.number().min(0).max(1).default(0.25),
  DETECTION_IOU: z.coerce.number().min(0).max(1).default(0.45),
  MAX_DETECTIONS: z.coerce.number().int().positive().default(100),
  INFERENCE_TIMEOUT_MS: durationMs(15_000),
  INFERENCE_CONCURRENCY: z.coerce.number().int().positive().default(2),
  QUERY_TIMEOUT_MS: durationMs(5_000),
  SESSION_STORE: z.enum(["memory", "supabase"]).default("memory"),
  SESSION_TTL_MS: durationMs(24 * 60 * 60 * 1000),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
});

export type AppConfig = {
  port: number;
  supabase: { url: string | null; serviceRoleKey: string | null };
  detector: {
    modelDir: string;
    inputSize: number;
    confidenceThreshold: number;
    iouThreshold: number;
    maxDetections: number;
    inferenceTimeoutMs: number;
    concurrency: number;
  };
  queryTimeoutMs: number;
  session: { store: "memory" | "supabase"; ttlMs: number };
  maxUploadBytes: number;
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Validate process environment into typed settings. Empty strings count as unset so a
 * blank line in `.env` falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => typeof value === "string" && value.trim().length > 0),
  );
  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration (${fields.join("; ")})`);
  }
  const values = parsed.data;

  return {
    port: values.PORT,
    supabase: {
      url: values.SUPABASE_URL ?? null,
      serviceRoleKey: values.SUPABASE_SERVICE_ROLE_KEY ?? null,
    },
    detector: {
      modelDir: values.MODEL_DIR,
      inputSize: values.MODEL_INPUT_SIZE,
      confidenceThreshold: values.DETECTION_CONFIDENCE,
      iouThreshold: values.DETECTION_IOU,
      maxDetections: values.MAX_DETECTIONS,
      inferenceTimeoutMs: values.INFERENCE_TIMEOUT_MS,
      concurrency: values.INFERENCE_CONCURRENCY,
    },
    queryTimeoutMs: values.QUERY_TIMEOUT_MS,
    session: { store: values.SESSION_STORE, ttlMs: values.SESSION_TTL_MS },
    maxUploadBytes: values.MAX_UPLOAD_BYTES,
  };
}
