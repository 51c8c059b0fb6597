/**
 * Collaborator adapters, selected by configuration.
 */

import { ConfigError, parseModelProvider, type AppConfig } from "../config/index.js";
import { AnthropicTextGenerator } from "./anthropic.js";
import { OpenAITextGenerator } from "./openai.js";
import { TavilyWebSearcher } from "./tavily.js";
import type { Collaborators, TextGenerator } from "./types.js";

export {
  CollaboratorError,
  SearchHitSchema,
  type Collaborators,
  type SearchHit,
  type TextGenerator,
  type WebSearcher,
} from "./types.js";
export { AnthropicTextGenerator } from "./anthropic.js";
export { OpenAITextGenerator } from "./openai.js";
export { TavilyWebSearcher, TAVILY_SEARCH_URL, type FetchLike } from "./tavily.js";

function createGenerator(config: AppConfig): TextGenerator {
  switch (parseModelProvider(config.modelProvider)) {
    case "anthropic":
      if (!config.anthropicApiKey) {
        throw new ConfigError("ANTHROPIC_API_KEY is required for MODEL_PROVIDER=anthropic");
      }
      return new AnthropicTextGenerator(config.anthropicApiKey);
    case "openai":
      if (!config.openaiApiKey) {
        throw new ConfigError("OPENAI_API_KEY is required for MODEL_PROVIDER=openai");
      }
      return new OpenAITextGenerator(config.openaiApiKey);
  }
}

/**
 * @throws ConfigError when the selected provider has no API key
 */
export function createCollaborators(config: AppConfig): Collaborators {
  if (!config.tavilyApiKey) {
    throw new ConfigError("TAVILY_API_KEY is required for SEARCH_PROVIDER=tavily");
  }
  return {
    generator: createGenerator(config),
    searcher: new TavilyWebSearcher(config.tavilyApiKey),
  };
}
