import cors from "cors";
import express, { type Express, type NextFunction, type Request, type Response } from "express";
import multer from "multer";
import { randomUUID } from "node:crypto";
import { z } from "zod";

import type { AppConfig } from "./config.js";
import type { IngredientDetector } from "./detector/types.js";
import { describeError, httpStatusForKind } from "./errors.js";
import { addIngredient } from "./ingredientSession.js";
import { getMetricsSnapshot, incrementMetric } from "./metrics.js";
import type { RecipeCatalog } from "./recipeCatalog.js";
import { matchRecipes } from "./recipeMatcher.js";
import { createTimeoutSignal } from "./resilience.js";
import { scanImage } from "./scanPipeline.js";
import { isValidSessionId, type IngredientSessionStore } from "./sessionStore.js";
import type {
  AddIngredientResponse,
  ErrorResponse,
  IngredientsResponse,
  RecipeDetailResponse,
  RecipeMatch,
  RecipeMatchPayload,
  RecipesResponse,
  UploadImageResponse,
} from "./types.js";

export type AppDependencies = {
  detector: IngredientDetector;
  catalog: RecipeCatalog;
  sessions: IngredientSessionStore;
  config: Pick<AppConfig, "maxUploadBytes" | "queryTimeoutMs">;
};

const SESSION_HEADER = "x-session-id";
const NO_SESSION_INGREDIENTS = "No ingredients detected. Please upload an image first.";

const AddIngredientBodySchema = z.object({
  ingredient: z.string().trim().min(1),
});

// Letters, digits, spaces, hyphens and apostrophes: nothing that needs quoting in a PostgREST filter.
const IngredientNameSchema = z
  .string()
  .max(100)
  .regex(/^[\p{L}\p{N}][\p{L}\p{N} '-]*$/u);

const RecipeIdSchema = z.coerce.number().int().positive();

const toRecipePayload = (match: RecipeMatch): RecipeMatchPayload => ({
  recipe_id: match.recipeId,
  name: match.name,
  match_count: match.matchCount,
  time: match.time,
  calories: match.calories,
});

/** Reuse the caller's session id when it looks like one of ours, otherwise mint a new one. */
const resolveSessionId = (req: Request, res: Response): string => {
  const header = req.get(SESSION_HEADER);
  const sessionId = isValidSessionId(header) ? header : randomUUID();
  res.setHeader(SESSION_HEADER, sessionId);
  return sessionId;
};

const errorStatus = (error: unknown): number | null => {
  if (!error || typeof error !== "object" || !("status" in error)) return null;
  const { status } = error;
  return typeof status === "number" && status >= 400 && status < 500 ? status : null;
};

export function createApp(deps: AppDependencies): Express {
  const { detector, catalog, sessions, config } = deps;

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: config.maxUploadBytes, files: 1 },
  });

  const app = express();
  app.use(cors({ exposedHeaders: [SESSION_HEADER, "x-request-id"] }));
  app.use(express.json({ limit: "100kb" }));

  // Minimal request logging (no body / no image bytes)
  app.use((req: Request, res: Response, next: NextFunction) => {
    const requestId = randomUUID();
    res.setHeader("x-request-id", requestId);
    const startedAt = process.hrtime.bigint();

    res.on("finish", () => {
      if (req.path === "/health") return;
      const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
      console.log(`[HTTP] ${res.statusCode} ${req.method} ${req.path} (${durationMs.toFixed(1)}ms) id=${requestId}`);
    });

    next();
  });

  // ============================================================================
  // ENDPOINTS
  // ============================================================================

  /**
   * POST /upload-image
   * Detect ingredients in the multipart `image` field and merge them into the session set
   */
  app.post("/upload-image", upload.single("image"), async (req: Request, res: Response) => {
    const file = req.file;
    if (!file) {
      return res.status(400).json({ error: "No image uploaded", code: "missing_image" } satisfies ErrorResponse);
    }
    if (!file.originalname.trim()) {
      return res.status(400).json({ error: "No selected file", code: "missing_image" } satisfies ErrorResponse);
    }

    try {
      const sessionId = resolveSessionId(req, res);
      const existing = await sessions.read(sessionId);
      const outcome = await scanImage(detector, file.buffer, existing);

      if (outcome.status === "failed") {
        return res
          .status(httpStatusForKind(outcome.kind))
          .json({ error: outcome.message, code: outcome.kind } satisfies ErrorResponse);
      }

      try {
        await sessions.write(sessionId, outcome.sessionIngredients);
      } catch (error) {
        incrementMetric("session_write_failed");
        console.warn(`[SessionStore] write failed for upload: ${describeError(error)}`);
      }

      return res.json({
        success: true,
        ingredients: outcome.ingredients,
        annotated_image: outcome.annotatedImage.toString("latin1"),
        session_ingredients: outcome.sessionIngredients,
      } satisfies UploadImageResponse);
    } catch (error) {
      console.error(`[Scan] stage=session unexpected error: ${describeError(error)}`);
      return res.status(500).json({ error: "Error processing image", code: "session_error" } satisfies ErrorResponse);
    }
  });

  /**
   * GET /recipes
   * Ranked recipes for the ingredients currently held in the session
   */
  app.get("/recipes", async (req: Request, res: Response) => {
    try {
      const sessionId = resolveSessionId(req, res);
      const ingredients = await sessions.read(sessionId);
      if (!ingredients.length) {
        return res.status(400).json({ error: NO_SESSION_INGREDIENTS, code: "no_ingredients" } satisfies ErrorResponse);
      }

      const recipes = await matchRecipes(catalog, ingredients, { timeoutMs: config.queryTimeoutMs });
      return res.json({ ingredients, recipes: recipes.map(toRecipePayload) } satisfies RecipesResponse);
    } catch (error) {
      console.error(`[RecipeMatcher] stage=session unexpected error: ${describeError(error)}`);
      return res.status(500).json({ error: "Error loading recipes", code: "session_error" } satisfies ErrorResponse);
    }
  });

  /**
   * GET /recipes/:recipeId
   */
  app.get("/recipes/:recipeId", async (req: Request, res: Response) => {
    const parsedId = RecipeIdSchema.safeParse(req.params.recipeId);
    if (!parsedId.success) {
      return res.status(400).json({ error: "Invalid recipe id", code: "invalid_recipe_id" } satisfies ErrorResponse);
    }

    const { signal, cleanup } = createTimeoutSignal(config.queryTimeoutMs);
    try {
      const recipe = await catalog.getRecipeById(parsedId.data, signal);
      if (!recipe) {
        return res.status(404).json({ error: "Recipe not found", code: "recipe_not_found" } satisfies ErrorResponse);
      }
      return res.json({
        recipe_id: recipe.recipeId,
        name: recipe.name,
        time: recipe.time,
        calories: recipe.calories,
        ingredients: recipe.ingredients,
      } satisfies RecipeDetailResponse);
    } catch (error) {
      console.error(`[RecipeCatalog] stage=recipe_detail id=${parsedId.data}: ${describeError(error)}`);
      return res.status(500).json({ error: "Error loading recipe", code: "data_access_error" } satisfies ErrorResponse);
    } finally {
      cleanup();
    }
  });

  /**
   * POST /add-ingredient
   * Manually add one ingredient name to the session set (no-op when already present)
   */
  app.post("/add-ingredient", async (req: Request, res: Response) => {
    const body = AddIngredientBodySchema.safeParse(req.body);
    if (!body.success) {
      return res
        .status(400)
        .json({ success: false, error: "No ingredient specified" } satisfies AddIngredientResponse);
    }
    const name = IngredientNameSchema.safeParse(body.data.ingredient);
    if (!name.success) {
      return res
        .status(400)
        .json({ success: false, error: "Invalid ingredient name" } satisfies AddIngredientResponse);
    }

    try {
      const sessionId = resolveSessionId(req, res);
      const existing = await sessions.read(sessionId);
      const ingredients = addIngredient(existing, name.data);
      if (ingredients.length !== existing.length) {
        await sessions.write(sessionId, ingredients);
      }
      return res.json({ success: true, ingredients } satisfies AddIngredientResponse);
    } catch (error) {
      incrementMetric("session_write_failed");
      console.error(`[SessionStore] add-ingredient failed: ${describeError(error)}`);
      return res
        .status(500)
        .json({ success: false, error: "Could not update ingredients" } satisfies AddIngredientResponse);
    }
  });

  /**
   * GET /all-ingredients
   */
  app.get("/all-ingredients", async (req: Request, res: Response) => {
    try {
      const sessionId = resolveSessionId(req, res);
      const ingredients = await sessions.read(sessionId);
      return res.json({ ingredients } satisfies IngredientsResponse);
    } catch (error) {
      console.error(`[SessionStore] read failed: ${describeError(error)}`);
      return res.status(500).json({ error: "Error loading ingredients", code: "session_error" } satisfies ErrorResponse);
    }
  });

  /**
   * Health check
   */
  app.get("/health", (_req: Request, res: Response) => {
    res.json({
      status: "ok",
      uptimeSec: Math.round(process.uptime()),
      metrics: getMetricsSnapshot(),
    });
  });

  // Upload limits, malformed JSON and anything a handler did not catch
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof multer.MulterError) {
      const status = error.code === "LIMIT_FILE_SIZE" ? 413 : 400;
      console.warn(`[HTTP] ${req.method} ${req.path} upload rejected: ${error.code}`);
      return res.status(status).json({ error: error.message, code: error.code.toLowerCase() } satisfies ErrorResponse);
    }

    const clientStatus = errorStatus(error);
    if (clientStatus) {
      console.warn(`[HTTP] ${req.method} ${req.path} rejected (${clientStatus}): ${describeError(error)}`);
      return res.status(clientStatus).json({ error: "Malformed request", code: "bad_request" } satisfies ErrorResponse);
    }

    if (error instanceof Error) {
      console.error(`[ERR] ${req.method} ${req.path}: ${error.message}\n${error.stack ?? ""}`);
    } else {
      console.error(`[ERR] ${req.method} ${req.path}: ${String(error)}`);
    }

    if (res.headersSent) {
      return;
    }

    res.status(500).json({ error: "internal_error" } satisfies ErrorResponse);
  });

  return app;
}
