/**
 * Provider enumerations for pipeline configuration.
 */

import { z } from "zod";

/**
 * Language-model providers with a bundled text-generation adapter.
 */
export const ModelProvider = z.enum(["anthropic", "openai"]);
export type ModelProvider = z.infer<typeof ModelProvider>;

/**
 * Web-search providers with a bundled search adapter.
 */
export const SearchProvider = z.enum(["tavily"]);
export type SearchProvider = z.infer<typeof SearchProvider>;
