/**
 * Deterministic capability stand-ins
 *
 * StubEmbeddingProvider returns fixed vectors per text, so tests control
 * exact cosine similarities. For completions, use MockCompletionProvider
 * with a responder.
 */

import type { EmbeddingProvider } from "@/types";

export class StubEmbeddingProvider implements EmbeddingProvider {
  public readonly name = "stub-embedding";
  public readonly calls: string[][] = [];

  constructor(
    private readonly vectors: Record<string, number[]>,
    private readonly fallback?: number[],
  ) {}

  async embed(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    return texts.map((text) => {
      const vector = this.vectors[text] ?? this.fallback;
      if (!vector) {
        throw new Error(`No stub vector for "${text}"`);
      }
      return vector;
    });
  }
}

/**
 * Unit vector on `axis`
 */
export function basis(axis: number, dims: number): number[] {
  return Array.from({ length: dims }, (_, i) => (i === axis ? 1 : 0));
}

/**
 * Unit vector whose cosine with basis(axis) is exactly `similarity`,
 * the remainder going to `otherAxis`
 */
export function towards(
  axis: number,
  similarity: number,
  otherAxis: number,
  dims: number,
): number[] {
  const v = new Array<number>(dims).fill(0);
  v[axis] = similarity;
  v[otherAxis] = Math.sqrt(1 - similarity * similarity);
  return v;
}
