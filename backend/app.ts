import express, { type Express, type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import type { ClinicDirectory } from "./maps/ClinicDirectory";
import { errorHandler } from "./middleware/errorHandler";
import { aiRateLimiter, enrichmentRateLimiter, generalRateLimiter } from "./middleware/rateLimiter";
import { RESUMPTION_TOKEN_HEADER, resumptionTokenMiddleware } from "./middleware/resumptionToken";
import {
  AnswerEditSchema,
  AnswerIndexSchema,
  AnswersSubmissionSchema,
  EnrichmentRequestSchema,
  FacilitySelectionSchema,
  parseInput,
  SymptomSubmissionSchema,
} from "./validation/schemas";
import type { WorkflowController } from "./workflow/WorkflowController";

// HTTP surface for the workflow. Routes only parse input and map results;
// every state change goes through WorkflowController.

export interface AppDependencies {
  readonly controller: WorkflowController;
  readonly directory: ClinicDirectory;
  readonly corsOrigins?: readonly string[];
  readonly rateLimiting?: boolean;
}

const DEFAULT_ORIGINS = [
  "http://localhost:5173",
  "http://localhost:5500",
  "http://127.0.0.1:5500",
  "http://localhost:3000",
  "http://localhost:3001",
];

// ---- Async error wrapper ----
function asyncHandler(fn: (req: Request, res: Response) => Promise<void>) {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}

export function createApp(deps: AppDependencies): Express {
  const app = express();
  const { controller, directory } = deps;
  const allowedOrigins = deps.corsOrigins && deps.corsOrigins.length > 0 ? deps.corsOrigins : DEFAULT_ORIGINS;
  const unlimited = deps.rateLimiting === false;

  app.use(cors({
    origin(requestOrigin: string | undefined, callback: (err: Error | null, allow?: boolean | string) => void) {
      // Allow server-to-server / curl / health-pings (no Origin header)
      if (!requestOrigin) return callback(null, true);
      if (allowedOrigins.includes(requestOrigin)) {
        return callback(null, requestOrigin);
      }
      console.warn(`[CORS] Blocked request from origin: ${requestOrigin}`);
      callback(new Error(`Origin ${requestOrigin} not allowed by CORS`));
    },
    methods: ["GET", "POST", "PUT", "OPTIONS"],
    allowedHeaders: ["Content-Type", "X-Resumption-Token"],
    exposedHeaders: ["X-Resumption-Token"],
  }));

  app.use(express.json({ limit: "100kb" }));

  // ---- Privacy headers (prevent response caching of symptom data) ----
  app.use((_req, res, next) => {
    res.setHeader("Cache-Control", "no-store, no-cache, must-revalidate, private");
    res.setHeader("Pragma", "no-cache");
    res.setHeader("Expires", "0");
    next();
  });

  app.use(resumptionTokenMiddleware);

  const passThrough = (_req: Request, _res: Response, next: NextFunction) => next();
  const general = unlimited ? passThrough : generalRateLimiter;
  const ai = unlimited ? passThrough : aiRateLimiter;
  const search = unlimited ? passThrough : enrichmentRateLimiter;

  app.use("/api", general);

  // Echo the current token in a header too, for clients that only read headers.
  function send(res: Response, body: { resumptionToken: string | null }): void {
    if (body.resumptionToken) res.setHeader(RESUMPTION_TOKEN_HEADER, body.resumptionToken);
    res.json(body);
  }

  app.get("/api/health", (_req, res) => {
    res.json({ status: "ok", clinics: directory.size, time: new Date().toISOString() });
  });

  app.get("/api/reference-points", (_req, res) => {
    res.json({
      referencePoints: directory.referencePoints.list().map((p) => ({ name: p.name, lat: p.coordinate.lat, lng: p.coordinate.lng })),
      limits: directory.limits,
    });
  });

  app.get("/api/workflow", asyncHandler(async (req, res) => {
    send(res, await controller.view(req.resumptionToken));
  }));

  app.post("/api/workflow/symptoms", ai, asyncHandler(async (req, res) => {
    const { symptomText } = parseInput(SymptomSubmissionSchema, req.body);
    send(res, await controller.submitSymptom(req.resumptionToken, symptomText));
  }));

  app.post("/api/workflow/answers", ai, asyncHandler(async (req, res) => {
    const { answers } = parseInput(AnswersSubmissionSchema, req.body);
    send(res, await controller.submitAnswers(req.resumptionToken, answers));
  }));

  app.put("/api/workflow/answers/:index", asyncHandler(async (req, res) => {
    const index = parseInput(AnswerIndexSchema, req.params.index, "index");
    const { answer } = parseInput(AnswerEditSchema, req.body);
    send(res, await controller.editAnswer(req.resumptionToken, index, answer));
  }));

  app.post("/api/workflow/facilities", asyncHandler(async (req, res) => {
    const selection = parseInput(FacilitySelectionSchema, req.body);
    send(res, await controller.lookupFacilities(req.resumptionToken, selection));
  }));

  app.post("/api/workflow/enrichment", search, asyncHandler(async (req, res) => {
    const { clinicIds } = parseInput(EnrichmentRequestSchema, req.body);
    send(res, await controller.enrichClinics(req.resumptionToken, clinicIds));
  }));

  app.post("/api/workflow/note", ai, asyncHandler(async (req, res) => {
    send(res, await controller.generateNote(req.resumptionToken));
  }));

  app.post("/api/workflow/restart", asyncHandler(async (req, res) => {
    send(res, await controller.restart(req.resumptionToken));
  }));

  app.use("/api", (req, res) => {
    res.status(404).json({ error: "not_found", message: `No route for ${req.method} ${req.originalUrl}.`, nextActions: ["view"] });
  });

  app.use(errorHandler);

  return app;
}
