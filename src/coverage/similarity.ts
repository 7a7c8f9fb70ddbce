/**
 * Similarity engine
 *
 * Cosine similarity between requirement and evidence embeddings:
 * L2-normalize each row, then take req_normalized · ev_normalized^T.
 * Scores are clipped to [0, 1]; zero-norm vectors score 0 against
 * everything.
 */

import type { SimilarityMatrix } from "@/types";
import { InvalidInputError } from "@/errors";

/**
 * Validate a non-empty set of equal-length finite vectors.
 * Returns the dimensionality.
 */
function validateVectors(vectors: number[][], label: string): number {
  if (vectors.length === 0) {
    throw new InvalidInputError(`${label} embeddings are empty`);
  }

  const dimensions = vectors[0].length;
  if (dimensions === 0) {
    throw new InvalidInputError(`${label} embeddings have zero dimensions`);
  }

  vectors.forEach((vector, row) => {
    if (vector.length !== dimensions) {
      throw new InvalidInputError(
        `${label} embedding ${row} has ${vector.length} dimensions, expected ${dimensions}`,
      );
    }
    if (!vector.every(Number.isFinite)) {
      throw new InvalidInputError(`${label} embedding ${row} contains non-finite values`);
    }
  });

  return dimensions;
}

/**
 * Scale a vector to unit length; a zero vector stays zero
 */
export function l2Normalize(vector: number[]): number[] {
  let sumSquares = 0;
  for (const value of vector) {
    sumSquares += value * value;
  }
  const norm = Math.sqrt(sumSquares);
  if (norm === 0) {
    return vector.map(() => 0);
  }
  return vector.map((value) => value / norm);
}

function clip01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * Compute the [R][E] cosine similarity matrix.
 *
 * @param requirementEmbeddings - R vectors of dimension D
 * @param evidenceEmbeddings - E vectors of dimension D
 * @returns matrix[i][j] = similarity(requirement i, evidence j) in [0, 1]
 * @throws {InvalidInputError} On empty input, ragged rows or mismatched dimensions
 */
export function computeSimilarityMatrix(
  requirementEmbeddings: number[][],
  evidenceEmbeddings: number[][],
): SimilarityMatrix {
  const reqDims = validateVectors(requirementEmbeddings, "Requirement");
  const evDims = validateVectors(evidenceEmbeddings, "Evidence");
  if (reqDims !== evDims) {
    throw new InvalidInputError(
      `Dimension mismatch: requirements have ${reqDims}, evidence has ${evDims}`,
    );
  }

  const reqNormalized = requirementEmbeddings.map(l2Normalize);
  const evNormalized = evidenceEmbeddings.map(l2Normalize);

  return reqNormalized.map((req) =>
    evNormalized.map((ev) => {
      let dot = 0;
      for (let k = 0; k < reqDims; k++) {
        dot += req[k] * ev[k];
      }
      return clip01(dot);
    }),
  );
}

/**
 * Highest score per evidence column (0 for an empty matrix)
 */
export function columnMax(matrix: SimilarityMatrix, columns: number): number[] {
  const maxima = new Array<number>(columns).fill(0);
  for (const row of matrix) {
    for (let j = 0; j < columns; j++) {
      if (row[j] > maxima[j]) {
        maxima[j] = row[j];
      }
    }
  }
  return maxima;
}

/**
 * Row index of the first maximum in a column (-1 for an empty matrix)
 */
export function columnArgMax(matrix: SimilarityMatrix, column: number): number {
  let bestRow = -1;
  let bestScore = -Infinity;
  matrix.forEach((row, i) => {
    if (row[column] > bestScore) {
      bestScore = row[column];
      bestRow = i;
    }
  });
  return bestRow;
}
