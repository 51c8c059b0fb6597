/**
 * The named prompt set used by the pipeline stages.
 */

import { PromptTemplateLoader, TemplateLoadError } from "./loader.js";
import { renderPrompt, type PromptVariables } from "./renderer.js";
import type { ParsedTemplate } from "./template.js";

export const PROMPT_NAMES = [
  "topic-analysis",
  "research-plan",
  "plan-refinement",
  "search-queries",
  "section-synthesis",
  "executive-summary",
  "conclusion",
] as const;

export type PromptName = (typeof PROMPT_NAMES)[number];

/** What steps need from prompts: render one by name. */
export interface PromptRenderer {
  render(name: PromptName, variables: PromptVariables): string;
}

export class PromptLibrary implements PromptRenderer {
  private readonly templates: ReadonlyMap<PromptName, ParsedTemplate>;

  private constructor(templates: ReadonlyMap<PromptName, ParsedTemplate>) {
    this.templates = templates;
  }

  /**
   * Load every named prompt up front so a missing file fails at start-up,
   * not in the middle of a run.
   */
  static load(loader: PromptTemplateLoader = new PromptTemplateLoader()): PromptLibrary {
    const templates = new Map<PromptName, ParsedTemplate>();
    for (const name of PROMPT_NAMES) {
      templates.set(name, loader.load(`${name}.md`));
    }
    return new PromptLibrary(templates);
  }

  render(name: PromptName, variables: PromptVariables): string {
    const template = this.templates.get(name);
    if (template === undefined) {
      throw new TemplateLoadError(`${name}.md`, `Prompt "${name}" is not loaded`);
    }
    return renderPrompt(template, variables);
  }
}
