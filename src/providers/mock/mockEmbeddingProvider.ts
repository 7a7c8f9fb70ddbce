/**
 * Deterministic embedding provider for development and tests
 *
 * Hashed bag-of-words: each alphanumeric token increments one of
 * MOCK_EMBEDDING_DIMENSIONS buckets (FNV-1a). Texts sharing words get a
 * positive cosine similarity; texts with no words get a zero vector.
 */

import type { EmbeddingProvider } from "@/types";
import {
  MOCK_EMBEDDING_DIMENSIONS,
  MOCK_EMBEDDING_PROVIDER_NAME,
} from "@/constants";
import { alphanumericTokens } from "@/utils";

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

function fnv1a(token: string): number {
  let hash = FNV_OFFSET_BASIS;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME) >>> 0;
  }
  return hash;
}

export class MockEmbeddingProvider implements EmbeddingProvider {
  public readonly name = MOCK_EMBEDDING_PROVIDER_NAME;
  private readonly dimensions: number;

  constructor(dimensions: number = MOCK_EMBEDDING_DIMENSIONS) {
    this.dimensions = dimensions;
  }

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.embedOne(text));
  }

  private embedOne(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of alphanumericTokens(text)) {
      vector[fnv1a(token) % this.dimensions] += 1;
    }
    return vector;
  }
}
