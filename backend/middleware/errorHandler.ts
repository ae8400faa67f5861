import type { NextFunction, Request, Response } from "express";
import { WorkflowError } from "../domain/WorkflowErrors";

// ---- Global error handler ----
// Workflow errors carry their own status and next actions. Everything else
// is a 500 without internals in the body.

function bodyParserErrorType(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "type" in err && typeof err.type === "string") return err.type;
  return undefined;
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof WorkflowError) {
    const log = err.httpStatus >= 500 ? console.error : console.warn;
    log(`[Workflow] ${req.method} ${req.path} -> ${err.httpStatus} ${err.code}: ${err.message}`);
    res.status(err.httpStatus).json(err.toJSON());
    return;
  }

  const parserError = bodyParserErrorType(err);
  if (parserError === "entity.parse.failed") {
    res.status(400).json({ error: "validation_error", message: "Request body must be valid JSON.", nextActions: ["fix-input"] });
    return;
  }
  if (parserError === "entity.too.large") {
    res.status(413).json({ error: "validation_error", message: "Request body is too large.", nextActions: ["fix-input"] });
    return;
  }

  console.error("[Server Error]", err instanceof Error ? err.stack ?? err.message : err);
  res.status(500).json({ error: "internal_error", message: "Internal server error.", nextActions: ["retry"] });
}
