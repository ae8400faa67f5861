import type { NextFunction, Request, Response } from "express";

// Reads the resumption token from the X-Resumption-Token header, or from
// `resumptionToken` in a JSON body. The header wins when both are present.

export const RESUMPTION_TOKEN_HEADER = "x-resumption-token";

declare global {
  namespace Express {
    interface Request {
      resumptionToken?: string;
    }
  }
}

export function resumptionTokenMiddleware(req: Request, _res: Response, next: NextFunction): void {
  const header = req.get(RESUMPTION_TOKEN_HEADER);
  const body: unknown = req.body;
  const fromBody =
    typeof body === "object" && body !== null && "resumptionToken" in body && typeof body.resumptionToken === "string"
      ? body.resumptionToken
      : undefined;

  const token = (header ?? fromBody)?.trim();
  if (token) req.resumptionToken = token;
  next();
}
