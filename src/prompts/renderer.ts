/**
 * Prompt renderer.
 *
 * Takes a ParsedTemplate and a flat variable map and produces the final
 * prompt string. Every placeholder must have a value; in strict mode
 * (the default) every supplied value must also be used.
 */

import { substitute, type ParsedTemplate } from "./template.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class PromptRenderError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly missingVariables: string[]
  ) {
    super(
      `Cannot render template "${templateName}": missing value(s) for: ` +
        missingVariables.join(", ")
    );
    this.name = "PromptRenderError";
  }
}

export class UnusedVariableError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly unusedVariables: string[]
  ) {
    super(
      `Template "${templateName}" does not use variable(s): ${unusedVariables.join(", ")}. ` +
        `Pass { strict: false } to allow unused variables.`
    );
    this.name = "UnusedVariableError";
  }
}

// ---------------------------------------------------------------------------
// Renderer
// ---------------------------------------------------------------------------

export type PromptVariables = Readonly<Record<string, string | number>>;

export interface RenderOptions {
  /**
   * When true (default), rendering fails if the variables contain names
   * the template does not reference.
   */
  strict?: boolean;
}

/**
 * Render a parsed template.
 *
 * @throws PromptRenderError   if any placeholder has no value
 * @throws UnusedVariableError if strict mode is on and a value is unused
 */
export function renderPrompt(
  template: ParsedTemplate,
  variables: PromptVariables,
  options: RenderOptions = {}
): string {
  const { strict = true } = options;
  const templateName = template.name ?? "(anonymous)";

  const values: Record<string, string> = {};
  for (const [key, value] of Object.entries(variables)) {
    values[key] = String(value);
  }

  const missing = template.variables.filter((v) => !(v in values));
  if (missing.length > 0) {
    throw new PromptRenderError(templateName, missing);
  }

  if (strict) {
    const used = new Set(template.variables);
    const unused = Object.keys(values).filter((k) => !used.has(k));
    if (unused.length > 0) {
      throw new UnusedVariableError(templateName, unused);
    }
  }

  return substitute(template.source, values);
}
