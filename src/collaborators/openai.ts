/**
 * Text generation through the OpenAI chat completions API.
 */

import OpenAI from "openai";
import type { ModelSettings } from "../config/pipeline/index.js";
import { CollaboratorError, type TextGenerator } from "./types.js";

export class OpenAITextGenerator implements TextGenerator {
  readonly name = "openai";
  private readonly client: OpenAI;

  constructor(apiKey: string, client?: OpenAI) {
    this.client = client ?? new OpenAI({ apiKey, maxRetries: 0 });
  }

  async generate(prompt: string, model: ModelSettings, signal: AbortSignal): Promise<string> {
    const response = await this.client.chat.completions.create(
      {
        model: model.model,
        max_tokens: model.maxTokens,
        temperature: model.temperature,
        messages: [{ role: "user", content: prompt }],
      },
      { signal }
    );

    const content = response.choices.at(0)?.message.content;
    if (content === null || content === undefined) {
      throw new CollaboratorError(this.name, "InvalidOutput", "No message content in response");
    }
    return content;
  }
}
