/**
 * Web search through the Tavily search API.
 */

import { z } from "zod";
import { classifyStatus } from "../gateway/classify.js";
import { CollaboratorError, type SearchHit, type WebSearcher } from "./types.js";

export const TAVILY_SEARCH_URL = "https://api.tavily.com/search";

const TavilyResponseSchema = z.object({
  results: z
    .array(
      z.object({
        title: z.string().default(""),
        url: z.string(),
        content: z.string().default(""),
      })
    )
    .default([]),
});

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export class TavilyWebSearcher implements WebSearcher {
  readonly name = "tavily";

  constructor(
    private readonly apiKey: string,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  async search(query: string, maxResults: number, signal: AbortSignal): Promise<SearchHit[]> {
    const response = await this.fetchImpl(TAVILY_SEARCH_URL, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        query,
        search_depth: "advanced",
        include_answer: false,
        max_results: maxResults,
      }),
      signal,
    });

    if (!response.ok) {
      throw new CollaboratorError(
        this.name,
        classifyStatus(response.status),
        `Tavily search failed with HTTP ${response.status}`
      );
    }

    const body: unknown = await response.json();
    const parsed = TavilyResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new CollaboratorError(
        this.name,
        "InvalidOutput",
        `Unexpected Tavily response: ${parsed.error.issues[0]?.message ?? "invalid shape"}`
      );
    }

    return parsed.data.results.slice(0, maxResults).map((r) => ({
      title: r.title,
      url: r.url,
      snippet: r.content,
    }));
  }
}
