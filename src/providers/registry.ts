/**
 * Provider registry — builds the capability bundle from configuration
 */

import type { AppConfig, ProviderBundle } from "@/types";
import { ConfigError } from "@/errors";
import { MockEmbeddingProvider } from "./mock/mockEmbeddingProvider";
import { MockCompletionProvider } from "./mock/mockCompletionProvider";
import { OpenAIEmbeddingProvider } from "./openai/openaiEmbeddingProvider";
import { OpenAICompletionProvider } from "./openai/openaiCompletionProvider";

export function createProviders(config: AppConfig): ProviderBundle {
  switch (config.provider) {
    case "mock":
      return {
        embedding: new MockEmbeddingProvider(),
        completion: new MockCompletionProvider(),
      };
    case "openai": {
      if (!config.openaiApiKey) {
        throw new ConfigError("OPENAI_API_KEY is required when PROVIDER=openai");
      }
      const base = {
        apiKey: config.openaiApiKey,
        baseUrl: config.openaiBaseUrl,
        timeoutMs: config.capabilityTimeoutMs,
      };
      return {
        embedding: new OpenAIEmbeddingProvider({ ...base, model: config.embeddingModel }),
        completion: new OpenAICompletionProvider({ ...base, model: config.completionModel }),
      };
    }
  }
}
