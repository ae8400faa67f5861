import { z, type ZodTypeAny } from "zod";
import { ValidationError } from "../domain/WorkflowErrors";

// Care Navigator: Input Validation Schemas (Zod)
//
// Validates all incoming payloads before they reach the workflow.
// The field schemas are shared by the HTTP layer and the controller, so a
// non-HTTP caller gets exactly the same limits.

export const SYMPTOM_TEXT_MAX_LENGTH = 2000;
export const ANSWER_MAX_LENGTH = 1000;
export const MAX_ENRICHMENT_BATCH = 20;

export function detectPromptInjection(text: string): boolean {
  // Basic patterns that suggest prompt injection attempts
  const patterns = [
    /ignore\s+(previous|above|all)\s+instructions/i,
    /forget\s+(everything|all|your)\s+/i,
    /\bsystem\s*prompt\b/i,
    /\boverride\b.*\binstructions?\b/i,
    /\bignore\b.*\bsafety\b/i,
    /\bjailbreak\b/i,
    /do\s+anything\s+now/i,
    /(?:以前|前|上記)の指示を(?:無視|忘れ)/,
    /システムプロンプト/,
  ];

  return patterns.some((p) => p.test(text));
}

const userText = (field: string, max: number) =>
  z
    .string({ required_error: `${field} is required`, invalid_type_error: `${field} must be a string` })
    .trim()
    .max(max, `${field} must be ${max} characters or less`)
    .refine((v) => !detectPromptInjection(v), { message: `${field} contains instructions for the assistant` });

export const SymptomTextSchema = userText("symptomText", SYMPTOM_TEXT_MAX_LENGTH).pipe(
  z.string().min(1, "symptomText must not be empty"),
);

// Empty answer = skipped question.
export const AnswerTextSchema = userText("answer", ANSWER_MAX_LENGTH);

export const AnswerListSchema = z.array(AnswerTextSchema).max(5, "At most 5 answers are accepted");

export const AnswerIndexSchema = z.coerce.number().int("index must be an integer").min(0, "index must be 0 or greater");

export const SearchOriginSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("reference"), name: z.string().trim().min(1, "origin.name is required") }),
  z.object({
    kind: z.literal("coordinate"),
    lat: z.number().min(-90).max(90),
    lng: z.number().min(-180).max(180),
  }),
]);

// Radius, count and closing-soon threshold outside the configured bounds are clamped, not rejected.
export const FacilitySelectionSchema = z.object({
  origin: SearchOriginSchema,
  radiusMeters: z.number().finite().optional(),
  maxResults: z.number().finite().optional(),
  closingSoonThresholdMinutes: z.number().finite().optional(),
  onlyAcceptingNow: z.boolean().default(false),
});

export const ClinicIdListSchema = z
  .array(z.string().trim().min(1))
  .min(1, "Select at least one clinic")
  .max(MAX_ENRICHMENT_BATCH, `At most ${MAX_ENRICHMENT_BATCH} clinics per request`)
  .transform((ids) => [...new Set(ids)]);

// --- API request schemas ---

export const SymptomSubmissionSchema = z.object({ symptomText: SymptomTextSchema });

// Omitted or short lists keep the stored answers for the remaining questions.
export const AnswersSubmissionSchema = z.object({ answers: AnswerListSchema.default([]) });

export const AnswerEditSchema = z.object({ answer: AnswerTextSchema });

export const EnrichmentRequestSchema = z.object({ clinicIds: ClinicIdListSchema });

export type FacilitySelectionInput = z.input<typeof FacilitySelectionSchema>;

// Parses or throws ValidationError naming the first offending field.
export function parseInput<S extends ZodTypeAny>(schema: S, value: unknown, field?: string): z.output<S> {
  const result = schema.safeParse(value);
  if (result.success) return result.data;

  const issue = result.error.issues[0];
  const path = [field, ...(issue?.path ?? [])].filter((p) => p !== undefined && p !== "").join(".");
  throw new ValidationError(issue?.message ?? "Invalid input.", path || undefined);
}
