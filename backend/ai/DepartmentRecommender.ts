import { z } from "zod";
import type { DepartmentRecommendation, DepartmentSuggestion } from "../domain/WorkflowState";
import { findDiagnosticLanguage } from "./DiagnosticLanguageFilter";
import { MAX_RECOMMENDED_DEPARTMENTS, OutputRejected, strictParseJsonObject } from "./PromptBuilders";

// REVIEW-FIRST POLICY:
// - Output names departments, never diseases.
// - Output MUST NOT be used to rank or prioritize clinics.

export const DEFAULT_DISCLAIMER =
  "This is not a medical diagnosis. Only a physician can diagnose your condition after an examination.";

// Accepts { department, rationale } and the older { specialization, reason } shape.
const SuggestionSchema = z.union([
  z.object({ department: z.string(), rationale: z.string() }),
  z
    .object({ specialization: z.string(), reason: z.string() })
    .transform((o) => ({ department: o.specialization, rationale: o.reason })),
]);

const RecommendationOutputSchema = z.object({
  departments: z.array(SuggestionSchema).min(1),
  disclaimer: z.string().optional(),
});

export function parseDepartmentRecommendation(raw: string): DepartmentRecommendation {
  const parsed = RecommendationOutputSchema.safeParse(strictParseJsonObject(raw));
  if (!parsed.success) throw new OutputRejected("missing or malformed departments array");

  const suggestions: DepartmentSuggestion[] = [];
  for (const s of parsed.data.departments) {
    const department = s.department.trim();
    const rationale = s.rationale.trim();
    if (!department || !rationale) throw new OutputRejected("department entries need a name and a rationale");
    if (suggestions.some((x) => x.department === department)) continue;
    suggestions.push({ department, rationale });
  }

  const [first, ...rest] = suggestions.slice(0, MAX_RECOMMENDED_DEPARTMENTS);
  if (first === undefined) throw new OutputRejected("no departments");

  const departments: DepartmentRecommendation["departments"] = [first, ...rest];
  for (const s of departments) {
    const hit = findDiagnosticLanguage(`${s.department}\n${s.rationale}`);
    if (hit) throw new OutputRejected(`diagnostic language in recommendation: "${hit}"`);
  }

  const disclaimer = parsed.data.disclaimer?.trim();
  return { departments, disclaimer: disclaimer ? disclaimer : DEFAULT_DISCLAIMER };
}
