/**
 * External capability contracts
 *
 * The core only ever sees these interfaces. Concrete classes (mock,
 * OpenAI-compatible) are swappable behind them.
 */

/**
 * Batch text embedding.
 *
 * Order-preserving: vector i belongs to text i. All vectors share one
 * dimensionality.
 */
export interface EmbeddingProvider {
  /** Provider/model label recorded on coverage results */
  readonly name: string;
  embed(texts: string[]): Promise<number[][]>;
}

export type CompletionRequest = {
  prompt: string;
  maxTokens: number;
  temperature: number;
  /** Optional system instruction */
  system?: string;
};

/**
 * Single-turn text completion.
 */
export interface CompletionProvider {
  readonly name: string;
  complete(req: CompletionRequest): Promise<string>;
}

export type ProviderKind = "mock" | "openai";

export type ProviderBundle = {
  embedding: EmbeddingProvider;
  completion: CompletionProvider;
};
