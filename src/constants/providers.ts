/**
 * External capability constants
 */

/**
 * Per-call timeout for embedding, completion and semantic checks
 */
export const DEFAULT_CAPABILITY_TIMEOUT_MS = 20_000;

export const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com/v1";

/** 1536 dimensions, tuned for similarity tasks */
export const DEFAULT_EMBEDDING_MODEL = "text-embedding-3-small";

export const DEFAULT_COMPLETION_MODEL = "gpt-4o";

/**
 * Dimensionality of the deterministic mock embeddings
 */
export const MOCK_EMBEDDING_DIMENSIONS = 256;

export const MOCK_EMBEDDING_PROVIDER_NAME = "mock-hashed-bow";
export const MOCK_COMPLETION_PROVIDER_NAME = "mock-completion";
