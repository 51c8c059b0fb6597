/**
 * Extraction of JSON answers from model text. Models wrap JSON in code
 * fences or prose; the outermost object is taken.
 */

import { z } from "zod";
import { StepError } from "../graph/index.js";

export const DraftSectionSchema = z.object({
  title: z.string().trim().min(1),
  questions: z.array(z.string().trim().min(1)).default([]),
});

export type DraftSection = z.infer<typeof DraftSectionSchema>;

export const DraftPlanSchema = z.object({
  methodology: z.string().trim().default(""),
  sections: z.array(DraftSectionSchema),
});

export type DraftPlan = z.infer<typeof DraftPlanSchema>;

export const PlanAdditionsSchema = z.object({
  sections: z.array(DraftSectionSchema),
});

export function extractJsonObject(text: string): unknown {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end < start) {
    throw new StepError("InvalidOutput", "Answer contains no JSON object");
  }

  try {
    return JSON.parse(text.slice(start, end + 1));
  } catch (err) {
    throw new StepError(
      "InvalidOutput",
      `Answer is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }
}

/**
 * Parse a model answer against a schema.
 *
 * @throws StepError (InvalidOutput) when the answer has no usable object
 */
export function parseJsonAnswer<T extends z.ZodTypeAny>(
  text: string,
  schema: T,
  what: string
): z.infer<T> {
  const result = schema.safeParse(extractJsonObject(text));
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new StepError("InvalidOutput", `Unusable ${what}: ${detail}`);
  }
  return result.data;
}

/**
 * Drop sections whose title repeats an earlier one (case-insensitive).
 */
export function uniqueSections(sections: readonly DraftSection[]): DraftSection[] {
  const seen = new Set<string>();
  const unique: DraftSection[] = [];
  for (const section of sections) {
    const key = section.title.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(section);
  }
  return unique;
}
