import type { ISODateTimeString, NonEmptyArray } from "./WorkflowState";

// Every specialist/certification claim must be attributable.
// A finding without at least one source URL never leaves the adapter.
export interface SpecialistFinding {
  readonly description: string;
  readonly sourceUrls: NonEmptyArray<string>;
}

export type ClinicEnrichment =
  | {
      readonly status: "found";
      // May be empty: "nothing attributable was published" is an expected outcome.
      readonly findings: readonly SpecialistFinding[];
      readonly searchedAt: ISODateTimeString;
    }
  | {
      readonly status: "unavailable";
      readonly reason: string;
      readonly attemptedAt: ISODateTimeString;
    };

export function isAttributableUrl(value: unknown): value is string {
  if (typeof value !== "string" || !value.trim()) return false;
  try {
    const url = new URL(value.trim());
    return (url.protocol === "https:" || url.protocol === "http:") && url.hostname.length > 0;
  } catch {
    return false;
  }
}

export function toAttributableFinding(description: string, urls: readonly unknown[]): SpecialistFinding | null {
  const text = description.trim();
  if (!text) return null;

  const sourceUrls: string[] = [];
  for (const u of urls) {
    if (isAttributableUrl(u) && !sourceUrls.includes(u.trim())) sourceUrls.push(u.trim());
  }

  const [first, ...rest] = sourceUrls;
  if (first === undefined) return null;
  return { description: text, sourceUrls: [first, ...rest] };
}
