/**
 * Prompt templates: parsing, rendering and loading from `prompts/`.
 *
 * USAGE:
 *
 *   import { PromptLibrary } from "./prompts/index.js";
 *
 *   const prompts = PromptLibrary.load();
 *   const text = prompts.render("search-queries", {
 *     topic: "Urban heat islands",
 *     sectionTitle: "Mitigation",
 *     questions: "- Which measures work?",
 *     queryCount: 3,
 *   });
 */

export {
  parseTemplate,
  extractVariables,
  substitute,
  TemplateParseError,
  type ParsedTemplate,
} from "./template.js";

export {
  renderPrompt,
  PromptRenderError,
  UnusedVariableError,
  type PromptVariables,
  type RenderOptions,
} from "./renderer.js";

export { PromptTemplateLoader, TemplateLoadError, DEFAULT_PROMPT_DIR } from "./loader.js";

export {
  PromptLibrary,
  PROMPT_NAMES,
  type PromptName,
  type PromptRenderer,
} from "./library.js";
