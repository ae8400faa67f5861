import jwt from "jsonwebtoken";
import { z } from "zod";
import { ValidationError } from "../domain/WorkflowErrors";
import { WorkflowStage } from "../domain/WorkflowStage";

// Resumption token
// - Signed (HS256) so a client cannot forge another session id or step.
// - Carries only { sid, step }: the server-side store is the source of truth.
// - Expires with the session TTL, so an expired token means an expired session.

const ClaimsSchema = z.object({
  sid: z.string().uuid(),
  step: z.nativeEnum(WorkflowStage),
});

export type ResumptionClaims = Readonly<{ sid: string; step: WorkflowStage }>;

export type DecodedResumptionToken =
  | { readonly kind: "valid"; readonly claims: ResumptionClaims }
  | { readonly kind: "expired"; readonly claims: ResumptionClaims };

function claimsFrom(payload: unknown): ResumptionClaims {
  const parsed = ClaimsSchema.safeParse(payload);
  if (!parsed.success) throw new ValidationError("The resumption token is malformed.", "resumptionToken");
  return { sid: parsed.data.sid, step: parsed.data.step };
}

export class ResumptionTokenCodec {
  constructor(
    private readonly secret: string,
    private readonly ttlMinutes: number,
  ) {}

  issue(claims: ResumptionClaims): string {
    return jwt.sign({ sid: claims.sid, step: claims.step }, this.secret, {
      algorithm: "HS256",
      expiresIn: this.ttlMinutes * 60,
    });
  }

  // Throws ValidationError for anything that is not a token we signed.
  decode(token: string): DecodedResumptionToken {
    try {
      return { kind: "valid", claims: claimsFrom(jwt.verify(token, this.secret, { algorithms: ["HS256"] })) };
    } catch (err) {
      if (err instanceof jwt.TokenExpiredError) {
        return { kind: "expired", claims: this.decodeIgnoringExpiry(token) };
      }
      if (err instanceof ValidationError) throw err;
      throw new ValidationError("The resumption token is malformed.", "resumptionToken");
    }
  }

  private decodeIgnoringExpiry(token: string): ResumptionClaims {
    try {
      return claimsFrom(jwt.verify(token, this.secret, { algorithms: ["HS256"], ignoreExpiration: true }));
    } catch (err) {
      if (err instanceof ValidationError) throw err;
      throw new ValidationError("The resumption token is malformed.", "resumptionToken");
    }
  }
}

// Unverified read of the session id, for rate-limit keys and log prefixes only.
export function peekSessionId(token: string | undefined): string | undefined {
  if (!token) return undefined;
  const parsed = ClaimsSchema.safeParse(jwt.decode(token));
  return parsed.success ? parsed.data.sid : undefined;
}
