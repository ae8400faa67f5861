import { SessionLost, ValidationError } from "../domain/WorkflowErrors";
import { stageName, WorkflowStage } from "../domain/WorkflowStage";
import type { WorkflowState } from "../domain/WorkflowState";
import type { SessionStore } from "../repository/SessionStore";
import type { ResumptionTokenCodec } from "./ResumptionToken";

// Session continuity
// - No token: a fresh visit (Intake).
// - Token whose state is still stored: resume; the stored state wins over the token's step.
// - Token past Intake whose state is gone (evicted, server restart, expired):
//   SessionLost. Never a silent reset to Intake.

export type ResolvedSession =
  | { readonly kind: "fresh" }
  | { readonly kind: "active"; readonly state: WorkflowState };

export class SessionContinuity {
  constructor(
    private readonly store: SessionStore,
    private readonly tokens: ResumptionTokenCodec,
  ) {}

  async resolve(rawToken: string | undefined): Promise<ResolvedSession> {
    const token = rawToken?.trim();
    if (!token) return { kind: "fresh" };

    const decoded = this.tokens.decode(token);
    const { sid, step } = decoded.claims;

    if (decoded.kind === "expired") {
      if (step === WorkflowStage.Intake) return { kind: "fresh" };
      console.warn(`[Session] ${sid.slice(0, 8)}: token expired at ${stageName(step)}`);
      throw new SessionLost(step, "expired");
    }

    const state = await this.store.get(sid);
    if (state) {
      if (state.stage !== step) {
        console.log(`[Session] ${sid.slice(0, 8)}: token step ${step} differs from stored stage ${state.stage}; using stored state`);
      }
      return { kind: "active", state };
    }

    if (step === WorkflowStage.Intake) return { kind: "fresh" };
    console.warn(`[Session] ${sid.slice(0, 8)}: no stored state for token at ${stageName(step)}`);
    throw new SessionLost(step, "evicted");
  }

  // Session id from a token regardless of expiry or stored state. Used by
  // restart, which must work even when the session is gone.
  sessionIdOf(rawToken: string | undefined): string | undefined {
    const token = rawToken?.trim();
    if (!token) return undefined;
    try {
      return this.tokens.decode(token).claims.sid;
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      console.warn("[Session] Ignoring malformed resumption token on restart");
      return undefined;
    }
  }

  issueToken(state: WorkflowState): string {
    return this.tokens.issue({ sid: state.sessionId, step: state.stage });
  }
}
