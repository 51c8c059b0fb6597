/**
 * Prompt template loader.
 *
 * Loads prompt templates from disk (.md or .txt files), parses them and
 * caches the parsed result.
 *
 *   const loader = new PromptTemplateLoader(DEFAULT_PROMPT_DIR);
 *   const tmpl = loader.load("search-queries.md");
 */

import { existsSync, readFileSync, readdirSync, statSync } from "node:fs";
import { join, extname, basename, resolve } from "node:path";
import { fileURLToPath } from "node:url";

import { parseTemplate, type ParsedTemplate } from "./template.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class TemplateLoadError extends Error {
  constructor(
    public readonly filePath: string,
    message?: string
  ) {
    super(message ?? `Failed to load template: ${filePath}`);
    this.name = "TemplateLoadError";
  }
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** File extensions recognized as prompt templates. */
const TEMPLATE_EXTENSIONS = new Set([".md", ".txt"]);

/** `prompts/` at the package root, from both src/ and dist/. */
export const DEFAULT_PROMPT_DIR = fileURLToPath(new URL("../../prompts/", import.meta.url));

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

export class PromptTemplateLoader {
  private readonly baseDir: string;
  private readonly cache = new Map<string, ParsedTemplate>();

  constructor(baseDir: string = DEFAULT_PROMPT_DIR) {
    this.baseDir = resolve(baseDir);

    if (!existsSync(this.baseDir)) {
      throw new TemplateLoadError(
        this.baseDir,
        `Template directory does not exist: ${this.baseDir}`
      );
    }
  }

  /**
   * Load and parse a single template file. Results are cached.
   *
   * @throws TemplateLoadError   if file is missing or has another extension
   * @throws TemplateParseError  if the template has malformed placeholders
   */
  load(filename: string): ParsedTemplate {
    const cached = this.cache.get(filename);
    if (cached) return cached;

    const filePath = join(this.baseDir, filename);

    if (!existsSync(filePath)) {
      throw new TemplateLoadError(filePath, `Template file not found: ${filePath}`);
    }

    const ext = extname(filename).toLowerCase();
    if (!TEMPLATE_EXTENSIONS.has(ext)) {
      throw new TemplateLoadError(
        filePath,
        `Unsupported template extension "${ext}". Use: ${[...TEMPLATE_EXTENSIONS].join(", ")}`
      );
    }

    const source = readFileSync(filePath, "utf-8");
    const parsed = parseTemplate(source, basename(filename, ext));

    this.cache.set(filename, parsed);
    return parsed;
  }

  /** Template filenames in the base directory (flat, sorted). */
  list(): string[] {
    return readdirSync(this.baseDir)
      .filter((entry) => {
        if (!statSync(join(this.baseDir, entry)).isFile()) return false;
        return TEMPLATE_EXTENSIONS.has(extname(entry).toLowerCase());
      })
      .sort();
  }

  clearCache(): void {
    this.cache.clear();
  }
}
