/**
 * OpenAI-compatible REST payloads (only the fields we read)
 */

export type EmbeddingsResponse = {
  data: Array<{ index: number; embedding: number[] }>;
  usage?: { total_tokens?: number };
};

export type ChatCompletionResponse = {
  choices: Array<{
    message: { content: string | null };
  }>;
};

export type OpenAIClientConfig = {
  apiKey: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;
};
