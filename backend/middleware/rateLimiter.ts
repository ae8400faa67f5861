import rateLimit from "express-rate-limit";
import type { Request } from "express";
import { peekSessionId } from "../session/ResumptionToken";
import "./resumptionToken"; // Request.resumptionToken

// Rate Limiting Middleware
//
// Three tiers:
// 1. General API: 100 req/min per session
// 2. Model-backed steps (questions, recommendation, note): 20 req/min per session
// 3. Specialist web search: 30 searches/hour per session
//
// Key extraction: session id from the resumption token, falls back to IP.

function extractKey(req: Request): string {
  // Prefer the session id for per-user limiting
  const sid = peekSessionId(req.resumptionToken);
  if (sid) return `sid:${sid}`;
  // Last resort: IP
  return req.ip || req.socket.remoteAddress || "unknown";
}

// General API rate limiter: 100 req/min
export const generalRateLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 100,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: extractKey,
  message: { error: "rate_limited", message: "Too many requests. Please try again later.", nextActions: ["retry"], retryAfterMs: 60000 },
});

// Model-backed step limiter: 20 req/min
export const aiRateLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 20,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: extractKey,
  message: { error: "rate_limited", message: "AI request limit reached. Please wait before trying again.", nextActions: ["retry"], retryAfterMs: 60000 },
});

// Specialist search limiter: 30 req/hour
export const enrichmentRateLimiter = rateLimit({
  windowMs: 60 * 60 * 1000, // 1 hour
  max: 30,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: extractKey,
  message: { error: "rate_limited", message: "Specialist search limit reached. Please try again later.", nextActions: ["retry"], retryAfterMs: 3600000 },
});
