/**
 * Prompt template parsing and variable extraction.
 *
 * A prompt template is plain markdown containing `{{variable}}`
 * placeholders. Names are alphanumeric (camelCase by convention);
 * whitespace inside the braces is trimmed, and a placeholder may appear
 * more than once.
 *
 *   # Search queries
 *   Write {{queryCount}} search queries for "{{sectionTitle}}".
 */

// ---------------------------------------------------------------------------
// Regex
// ---------------------------------------------------------------------------

/**
 * Matches `{{variableName}}` with optional inner whitespace.
 * Captures the trimmed variable name in group 1.
 */
const PLACEHOLDER_RE = /\{\{\s*([a-zA-Z][a-zA-Z0-9_]*)\s*\}\}/g;

/** Any opening of a placeholder, well-formed or not. */
const OPEN_BRACES_RE = /\{\{/g;

// ---------------------------------------------------------------------------
// Parsed template
// ---------------------------------------------------------------------------

export interface ParsedTemplate {
  /** The raw template source string (with placeholders intact). */
  source: string;
  /** Unique variable names found in {{…}} placeholders, sorted. */
  variables: string[];
  name?: string;
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class TemplateParseError extends Error {
  constructor(
    public readonly templateName: string,
    message: string
  ) {
    super(`Template "${templateName}": ${message}`);
    this.name = "TemplateParseError";
  }
}

// ---------------------------------------------------------------------------
// Extraction
// ---------------------------------------------------------------------------

/**
 * Extract all `{{…}}` placeholder names from a template string.
 * Returns deduplicated, sorted variable names.
 */
export function extractVariables(source: string): string[] {
  const found = new Set<string>();
  for (const match of source.matchAll(PLACEHOLDER_RE)) {
    found.add(match[1]);
  }
  return [...found].sort();
}

/**
 * Parse a template string.
 *
 * @throws TemplateParseError if a `{{` does not open a valid placeholder
 */
export function parseTemplate(source: string, name?: string): ParsedTemplate {
  const opened = [...source.matchAll(OPEN_BRACES_RE)].length;
  const wellFormed = [...source.matchAll(PLACEHOLDER_RE)].length;

  if (opened !== wellFormed) {
    throw new TemplateParseError(
      name ?? "(anonymous)",
      `${opened - wellFormed} malformed placeholder(s)`
    );
  }

  return { source, variables: extractVariables(source), name };
}

/** Substitute placeholders; unknown names render as empty text. */
export function substitute(
  source: string,
  values: Readonly<Record<string, string>>
): string {
  return source.replace(PLACEHOLDER_RE, (_match, name: string) => values[name] ?? "");
}
