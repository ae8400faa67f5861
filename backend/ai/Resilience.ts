import { WorkflowSuperseded } from "../domain/WorkflowErrors";

// Retry/timeout policy around provider calls.
// - Transient failures (rate limits, 5xx, timeouts, connection resets) are retried with backoff.
// - Anything else fails immediately.
// - An aborted caller signal means the workflow moved on; that is never retried.

export type RetryPolicy = Readonly<{
  timeoutMs: number;
  maxRetries: number;
  baseDelayMs: number;
}>;

const TRANSIENT_STATUS = new Set([408, 429, 500, 502, 503, 504]);
const TRANSIENT_CODES = new Set(["ECONNRESET", "ECONNREFUSED", "ETIMEDOUT", "EAI_AGAIN", "EPIPE", "UND_ERR_CONNECT_TIMEOUT", "UND_ERR_SOCKET"]);

export class ProviderTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Provider call timed out after ${timeoutMs}ms.`);
    this.name = "ProviderTimeoutError";
  }
}

function readStatus(err: object): number | undefined {
  if ("status" in err && typeof err.status === "number") return err.status;
  if ("code" in err && typeof err.code === "number") return err.code;
  return undefined;
}

function readCode(err: object): string | undefined {
  if ("code" in err && typeof err.code === "string") return err.code;
  if ("cause" in err && typeof err.cause === "object" && err.cause !== null) return readCode(err.cause);
  return undefined;
}

export function isTransientError(err: unknown): boolean {
  if (err instanceof ProviderTimeoutError) return true;
  if (typeof err !== "object" || err === null) return false;

  const status = readStatus(err);
  if (status !== undefined && TRANSIENT_STATUS.has(status)) return true;

  const code = readCode(err);
  if (code !== undefined && TRANSIENT_CODES.has(code)) return true;

  return err instanceof TypeError && /fetch failed|network/i.test(err.message);
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return typeof err === "string" ? err : "unknown error";
}

export function backoffDelayMs(attempt: number, baseDelayMs: number): number {
  return baseDelayMs * 2 ** attempt;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new WorkflowSuperseded());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

// Runs one attempt under a per-attempt deadline combined with the caller's signal.
async function attemptWithTimeout<T>(fn: (signal: AbortSignal) => Promise<T>, timeoutMs: number, signal?: AbortSignal): Promise<T> {
  const deadline = AbortSignal.timeout(timeoutMs);
  const combined = signal ? AbortSignal.any([signal, deadline]) : deadline;

  let onAbort: (() => void) | undefined;
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => reject(signal?.aborted ? new WorkflowSuperseded() : new ProviderTimeoutError(timeoutMs));
    combined.addEventListener("abort", onAbort, { once: true });
  });

  try {
    return await Promise.race([fn(combined), aborted]);
  } catch (err) {
    if (signal?.aborted) throw new WorkflowSuperseded();
    if (deadline.aborted) throw new ProviderTimeoutError(timeoutMs);
    throw err;
  } finally {
    if (onAbort) combined.removeEventListener("abort", onAbort);
  }
}

export async function withTransientRetry<T>(
  label: string,
  fn: (signal: AbortSignal) => Promise<T>,
  policy: RetryPolicy,
  signal?: AbortSignal,
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    if (signal?.aborted) throw new WorkflowSuperseded();
    try {
      return await attemptWithTimeout(fn, policy.timeoutMs, signal);
    } catch (err) {
      if (err instanceof WorkflowSuperseded) throw err;
      if (!isTransientError(err) || attempt >= policy.maxRetries) throw err;

      const delay = backoffDelayMs(attempt, policy.baseDelayMs);
      console.warn(`[AI] ${label}: transient failure (${describeError(err)}), retry ${attempt + 1}/${policy.maxRetries} in ${delay}ms`);
      await sleep(delay, signal);
    }
  }
}
