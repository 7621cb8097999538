import dotenv from "dotenv";

import { createApp } from "./app.js";
import { ConfigError, loadConfig } from "./config.js";
import { loadGraphModel } from "./detector/modelLoader.js";
import { YoloDetector } from "./detector/yoloDetector.js";
import { labelForClass } from "./ingredientLabels.js";
import { startMetricsFlush, stopMetricsFlush } from "./metrics.js";
import { createSupabaseRecipeCatalog } from "./recipeCatalog.js";
import {
  MemoryIngredientSessionStore,
  SupabaseIngredientSessionStore,
  type IngredientSessionStore,
} from "./sessionStore.js";
import { createSupabaseClient } from "./supabase.js";

dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig();
  const supabase = createSupabaseClient(config.supabase);

  // Loaded once; every request shares the same read-only model.
  const model = await loadGraphModel(config.detector.modelDir, config.detector.inputSize);
  const detector = new YoloDetector(model, {
    confidenceThreshold: config.detector.confidenceThreshold,
    iouThreshold: config.detector.iouThreshold,
    maxDetections: config.detector.maxDetections,
    inferenceTimeoutMs: config.detector.inferenceTimeoutMs,
    concurrency: config.detector.concurrency,
    labelFor: labelForClass,
  });

  const sessions: IngredientSessionStore =
    config.session.store === "supabase"
      ? new SupabaseIngredientSessionStore(supabase, config.queryTimeoutMs)
      : new MemoryIngredientSessionStore(config.session.ttlMs);

  const app = createApp({
    detector,
    catalog: createSupabaseRecipeCatalog(supabase),
    sessions,
    config,
  });

  startMetricsFlush();

  const server = app.listen(config.port, () => {
    console.log(`Ingredient scanner listening on http://localhost:${config.port} (session store: ${config.session.store})`);
  });

  const shutdown = (signal: string) => {
    console.log(`[Server] ${signal} received, closing`);
    stopMetricsFlush();
    server.close((error) => {
      if (error) {
        console.error("[Server] close failed", error);
        process.exit(1);
      }
      process.exit(0);
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

process.on("unhandledRejection", (reason) => {
  console.error("[UNHANDLED_REJECTION]", reason);
});

process.on("uncaughtException", (err) => {
  console.error("[UNCAUGHT_EXCEPTION]", err);
  process.exit(1);
});

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(`[Config] ${error.message}`);
  } else {
    console.error("[Server] Failed to start:", error);
  }
  process.exit(1);
});
