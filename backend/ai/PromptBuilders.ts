import type { Clinic } from "../domain/Clinic";
import type { ClarifyingAnswer } from "../domain/WorkflowState";

// This file builds deterministic, task-specific prompts from workflow data.
// It also owns the tolerant JSON extraction every structured task shares.
// No provider logic exists here; GenerationClient owns all provider calls.

export const MAX_CLARIFYING_QUESTIONS = 5;
export const MAX_RECOMMENDED_DEPARTMENTS = 3;

// Raised by output parsers. The structured-generation loop turns it into one
// stricter re-prompt, then a GenerationError.
export class OutputRejected extends Error {
  constructor(readonly reason: string) {
    super(reason);
    this.name = "OutputRejected";
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function stableJsonStringify(value: unknown): string {
  // Deterministic JSON: sorts object keys recursively.
  // This keeps prompts stable and makes caching more predictable.
  const seen = new WeakSet<object>();

  const normalize = (v: unknown): unknown => {
    if (v === null || typeof v !== "object") return v;
    if (Array.isArray(v)) return v.map(normalize);

    if (seen.has(v)) {
      return "[CYCLE]";
    }
    seen.add(v);

    const out: Record<string, unknown> = {};
    for (const [k, inner] of Object.entries(v).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      out[k] = normalize(inner);
    }
    return out;
  };

  return JSON.stringify(normalize(value));
}

function stripCodeFence(raw: string): string {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(raw);
  return fenced ? fenced[1].trim() : raw.trim();
}

// Accepts a bare JSON object, one wrapped in a markdown fence, or one
// surrounded by prose. Anything else is rejected.
export function strictParseJsonObject(raw: string): Record<string, unknown> {
  const text = stripCodeFence(raw);
  if (!text) throw new OutputRejected("empty output");

  const candidates = [text];
  const first = text.indexOf("{");
  const last = text.lastIndexOf("}");
  if (first >= 0 && last > first) candidates.push(text.slice(first, last + 1));

  for (const candidate of candidates) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(candidate);
    } catch {
      continue;
    }
    if (isRecord(parsed)) return parsed;
  }
  throw new OutputRejected("output was not a JSON object");
}

const LANGUAGE_RULE = "- Write every user-facing string in the same language as the patient's symptom description.\n";

const NON_DIAGNOSTIC_RULES =
  "SAFETY RULES:\n" +
  "- NO DIAGNOSIS. Never name a disease or condition the patient has or probably has.\n" +
  "- NO disease probabilities.\n" +
  "- NO treatment or medication advice.\n";

function answersPayload(answers: readonly ClarifyingAnswer[]): ReadonlyArray<Record<string, string>> {
  return answers.map((a) => ({ question: a.question, answer: a.answer.trim() ? a.answer.trim() : "(skipped)" }));
}

export function buildClarifyingQuestionsPrompt(args: { readonly symptomText: string }): string {
  // Task-specific prompt. Do not reuse for other tasks.
  return (
    "TASK: Clarifying Questions\n" +
    "ROLE: You assist a patient before a clinic visit. Ask what a clinician would need to know next.\n" +
    NON_DIAGNOSTIC_RULES +
    "OUTPUT RULES:\n" +
    `- Ask between 1 and ${MAX_CLARIFYING_QUESTIONS} short questions, one topic per question.\n` +
    "- Prefer onset, location, character, severity, duration, triggers and accompanying symptoms.\n" +
    LANGUAGE_RULE +
    "- Return ONLY valid JSON. No markdown. No extra keys beyond the schema.\n\n" +
    "INPUT:\n" +
    stableJsonStringify({ symptomText: args.symptomText }) +
    "\n\n" +
    "RETURN JSON SCHEMA:\n" +
    '{ "questions": ["string"] }\n'
  );
}

export function buildDepartmentRecommendationPrompt(args: {
  readonly symptomText: string;
  readonly answers: readonly ClarifyingAnswer[];
}): string {
  return (
    "TASK: Department Recommendation\n" +
    "ROLE: Suggest which hospital departments (e.g. 内科, 消化器内科, 整形外科) the patient could visit.\n" +
    NON_DIAGNOSTIC_RULES +
    "- Rationales explain why a department handles these symptoms, not what the patient has.\n" +
    "OUTPUT RULES:\n" +
    `- Suggest between 1 and ${MAX_RECOMMENDED_DEPARTMENTS} departments, most relevant first.\n` +
    "- Use the department names Japanese clinics publish (標榜科目).\n" +
    "- disclaimer: one sentence stating this is not a diagnosis and only a physician can diagnose.\n" +
    LANGUAGE_RULE +
    "- Return ONLY valid JSON. No markdown. No extra keys beyond the schema.\n\n" +
    "INPUT:\n" +
    stableJsonStringify({ symptomText: args.symptomText, answers: answersPayload(args.answers) }) +
    "\n\n" +
    "RETURN JSON SCHEMA:\n" +
    "{\n" +
    '  "departments": [{ "department": "string", "rationale": "string" }],\n' +
    '  "disclaimer": "string"\n' +
    "}\n"
  );
}

export function buildPqrstNotePrompt(args: {
  readonly symptomText: string;
  readonly answers: readonly ClarifyingAnswer[];
}): string {
  return (
    "TASK: PQRST Pre-Visit Note\n" +
    "ROLE: Summarize what the patient reported so they can hand it to the clinician.\n" +
    NON_DIAGNOSTIC_RULES +
    "- Use ONLY information the patient gave. Do not infer or invent details.\n" +
    "OUTPUT RULES:\n" +
    '- When the patient did not provide information for a section, write exactly "not provided".\n' +
    "- Keep each section to one or two short sentences.\n" +
    LANGUAGE_RULE +
    "- Return ONLY valid JSON. No markdown. No extra keys beyond the schema.\n\n" +
    "INPUT:\n" +
    stableJsonStringify({ symptomText: args.symptomText, answers: answersPayload(args.answers) }) +
    "\n\n" +
    "RETURN JSON SCHEMA:\n" +
    "{\n" +
    '  "provocationPalliation": "string (what makes it worse or better)",\n' +
    '  "quality": "string (what it feels like)",\n' +
    '  "regionRadiation": "string (where it is, whether it spreads)",\n' +
    '  "severity": "string (how bad, e.g. a 0-10 rating)",\n' +
    '  "timeCourse": "string (onset, duration, pattern)"\n' +
    "}\n"
  );
}

export function buildSpecialistSearchPrompt(args: { readonly clinic: Clinic }): string {
  const c = args.clinic;
  return (
    "Search the web for publicly listed board-certified specialists (専門医・認定医) who work at this clinic.\n" +
    "Report each specialist qualification as its own sentence, e.g. the physician's name and the certifying society.\n" +
    "Only report facts stated on the pages you found. If nothing is published, say so in one sentence.\n" +
    "Answer in Japanese.\n\n" +
    stableJsonStringify({
      name: c.name,
      address: c.address,
      departments: c.departments,
      website: c.website ?? null,
    })
  );
}

export function withStricterOutputRules(prompt: string, rejection: string): string {
  return (
    prompt +
    "\nPREVIOUS ATTEMPT REJECTED: " +
    rejection +
    "\n" +
    "Return ONLY the JSON object described above: no markdown fences, no commentary, no diagnosis or disease names.\n"
  );
}
