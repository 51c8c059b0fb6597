/**
 * Text generation through the Anthropic messages API.
 */

import Anthropic from "@anthropic-ai/sdk";
import type { ModelSettings } from "../config/pipeline/index.js";
import { CollaboratorError, type TextGenerator } from "./types.js";

export class AnthropicTextGenerator implements TextGenerator {
  readonly name = "anthropic";
  private readonly client: Anthropic;

  constructor(apiKey: string, client?: Anthropic) {
    // Retries belong to the gateway.
    this.client = client ?? new Anthropic({ apiKey, maxRetries: 0 });
  }

  async generate(prompt: string, model: ModelSettings, signal: AbortSignal): Promise<string> {
    const response = await this.client.messages.create(
      {
        model: model.model,
        max_tokens: model.maxTokens,
        temperature: model.temperature,
        messages: [{ role: "user", content: prompt }],
      },
      { signal }
    );

    const textContent = response.content.find((block) => block.type === "text");
    if (!textContent || textContent.type !== "text") {
      throw new CollaboratorError(this.name, "InvalidOutput", "No text content in response");
    }
    return textContent.text;
  }
}
