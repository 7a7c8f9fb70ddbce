/**
 * OpenAI-compatible embeddings provider
 *
 * POST {baseUrl}/embeddings with the whole batch; vectors are re-ordered
 * by the `index` field of the response.
 */

import type { EmbeddingProvider, HttpRequestFn } from "@/types";
import type {
  EmbeddingsResponse,
  OpenAIClientConfig,
} from "@/types/clients/openai";
import { httpRequest } from "@/clients/http";
import { EmbeddingError, errorMessage } from "@/errors";
import * as logger from "@/logger";

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  public readonly name: string;
  private readonly config: OpenAIClientConfig;
  private readonly request: HttpRequestFn;

  constructor(config: OpenAIClientConfig, request: HttpRequestFn = httpRequest) {
    this.config = config;
    this.request = request;
    this.name = config.model;
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    let response: EmbeddingsResponse;
    try {
      response = await this.request<EmbeddingsResponse>({
        method: "POST",
        url: `${this.config.baseUrl}/embeddings`,
        headers: { Authorization: `Bearer ${this.config.apiKey}` },
        json: {
          model: this.config.model,
          input: texts,
          encoding_format: "float",
        },
        timeoutMs: this.config.timeoutMs,
      });
    } catch (err) {
      throw new EmbeddingError(`Embedding request failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    const data = response?.data;
    if (!Array.isArray(data) || data.length !== texts.length) {
      throw new EmbeddingError(
        `Expected ${texts.length} embeddings, got ${Array.isArray(data) ? data.length : "none"}`,
      );
    }

    const vectors: number[][] = new Array(texts.length);
    for (const item of data) {
      if (item.index < 0 || item.index >= texts.length || !Array.isArray(item.embedding)) {
        throw new EmbeddingError(`Malformed embedding item at index ${item.index}`);
      }
      vectors[item.index] = item.embedding;
    }
    for (let i = 0; i < vectors.length; i++) {
      if (!vectors[i]) {
        throw new EmbeddingError(`Missing embedding for input ${i}`);
      }
    }

    logger.debug("Generated embeddings", {
      model: this.config.model,
      count: texts.length,
      dimensions: vectors[0]?.length ?? 0,
      tokensUsed: response.usage?.total_tokens,
    });

    return vectors;
  }
}
