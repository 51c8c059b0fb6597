/**
 * Context shared by the planning, research and report steps.
 */

import type { CallGateway } from "../gateway/index.js";
import type { PipelineConfig } from "../config/pipeline/index.js";
import type { PromptRenderer } from "../prompts/index.js";
import { StepError, type StepRuntime } from "../graph/index.js";

/** The two gateway calls steps are allowed to make. */
export type StepGateway = Pick<CallGateway, "generateText" | "webSearch">;

export interface StageContext extends StepRuntime {
  readonly gateway: StepGateway;
  readonly prompts: PromptRenderer;
  readonly config: PipelineConfig;
  readonly now: () => Date;
}

/**
 * Generate text through the gateway and reject an empty answer.
 */
export async function generateRequired(
  context: StageContext,
  prompt: string,
  what: string
): Promise<string> {
  const text = await context.gateway.generateText(prompt, { signal: context.signal });
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    throw new StepError("InvalidOutput", `Empty ${what} from the text generator`);
  }
  return trimmed;
}

/** Bulleted question list for prompts. */
export function formatQuestions(questions: readonly string[]): string {
  if (questions.length === 0) return "- (no specific questions)";
  return questions.map((q) => `- ${q}`).join("\n");
}
