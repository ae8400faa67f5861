import { z } from "zod";
import type { NonEmptyArray } from "../domain/WorkflowState";
import { MAX_CLARIFYING_QUESTIONS, OutputRejected, strictParseJsonObject } from "./PromptBuilders";

// Items may be plain strings or { question } / { text } objects.
const QuestionItemSchema = z.union([
  z.string(),
  z.object({ question: z.string() }).transform((o) => o.question),
  z.object({ text: z.string() }).transform((o) => o.text),
]);

const ClarifyingQuestionsOutputSchema = z.object({
  questions: z.array(QuestionItemSchema.catch("")),
});

// 1..MAX_CLARIFYING_QUESTIONS distinct, non-empty questions. Extras are dropped.
export function parseClarifyingQuestions(raw: string): NonEmptyArray<string> {
  const parsed = ClarifyingQuestionsOutputSchema.safeParse(strictParseJsonObject(raw));
  if (!parsed.success) throw new OutputRejected("missing questions array");

  const questions: string[] = [];
  for (const q of parsed.data.questions) {
    const text = q.trim();
    if (text && !questions.includes(text)) questions.push(text);
  }

  const [first, ...rest] = questions;
  if (first === undefined) throw new OutputRejected("no usable questions");
  return [first, ...rest.slice(0, MAX_CLARIFYING_QUESTIONS - 1)];
}
