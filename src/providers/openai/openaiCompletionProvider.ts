/**
 * OpenAI-compatible chat completion provider
 */

import type { CompletionProvider, CompletionRequest, HttpRequestFn } from "@/types";
import type {
  ChatCompletionResponse,
  OpenAIClientConfig,
} from "@/types/clients/openai";
import { httpRequest } from "@/clients/http";
import { ExternalCapabilityError, errorMessage } from "@/errors";

export class OpenAICompletionProvider implements CompletionProvider {
  public readonly name: string;
  private readonly config: OpenAIClientConfig;
  private readonly request: HttpRequestFn;

  constructor(config: OpenAIClientConfig, request: HttpRequestFn = httpRequest) {
    this.config = config;
    this.request = request;
    this.name = config.model;
  }

  async complete(req: CompletionRequest): Promise<string> {
    const messages: Array<{ role: "system" | "user"; content: string }> = [];
    if (req.system) {
      messages.push({ role: "system", content: req.system });
    }
    messages.push({ role: "user", content: req.prompt });

    let response: ChatCompletionResponse;
    try {
      response = await this.request<ChatCompletionResponse>({
        method: "POST",
        url: `${this.config.baseUrl}/chat/completions`,
        headers: { Authorization: `Bearer ${this.config.apiKey}` },
        json: {
          model: this.config.model,
          messages,
          max_tokens: req.maxTokens,
          temperature: req.temperature,
        },
        timeoutMs: this.config.timeoutMs,
      });
    } catch (err) {
      throw new ExternalCapabilityError(
        "completion",
        `Completion request failed: ${errorMessage(err)}`,
        { cause: err },
      );
    }

    const content = response?.choices?.[0]?.message?.content;
    if (typeof content !== "string") {
      throw new ExternalCapabilityError("completion", "Completion response had no content");
    }
    return content;
  }
}
