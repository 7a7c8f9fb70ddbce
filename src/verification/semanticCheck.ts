/**
 * Semantic equivalence check
 *
 * Asks the completion provider whether a claim is supported by one
 * evidence text. Deterministic settings; only an exact "YES" counts.
 * Any failure is a "no", never an error for the caller.
 */

import type { CompletionProvider } from "@/types";
import {
  DEFAULT_CAPABILITY_TIMEOUT_MS,
  LOG_TEXT_PREVIEW_LENGTH,
  SEMANTIC_CHECK_ACCEPT_ANSWER,
  SEMANTIC_CHECK_MAX_TOKENS,
  SEMANTIC_CHECK_TEMPERATURE,
} from "@/constants";
import { errorMessage } from "@/errors";
import { withTimeout } from "@/providers/withTimeout";
import * as logger from "@/logger";

export type SemanticCheckComponent = "action" | "outcome";

/**
 * (claim, evidenceText, component) -> supported?
 */
export type SemanticChecker = (
  claim: string,
  evidenceText: string,
  component: SemanticCheckComponent,
) => Promise<boolean>;

export function buildSemanticCheckPrompt(claim: string, evidenceText: string): string {
  return [
    "You are verifying resume claims against evidence.",
    "",
    `Claim: ${claim}`,
    `Evidence: ${evidenceText}`,
    "",
    "Question: Is the claim substantially supported by the evidence?",
    "Consider paraphrasing and synonyms, but the core meaning must match.",
    "",
    'Answer with ONLY "YES" or "NO".',
  ].join("\n");
}

/**
 * Bind a completion provider into a SemanticChecker
 */
export function createSemanticChecker(
  completion: CompletionProvider,
  timeoutMs: number = DEFAULT_CAPABILITY_TIMEOUT_MS,
): SemanticChecker {
  return async (claim, evidenceText, component) => {
    const label = component === "action" ? "Action" : "Outcome";
    const prompt = buildSemanticCheckPrompt(`${label}: ${claim}`, evidenceText);

    try {
      const answer = await withTimeout("completion", timeoutMs, () =>
        completion.complete({
          prompt,
          maxTokens: SEMANTIC_CHECK_MAX_TOKENS,
          temperature: SEMANTIC_CHECK_TEMPERATURE,
        }),
      );
      return answer.trim().toUpperCase() === SEMANTIC_CHECK_ACCEPT_ANSWER;
    } catch (err) {
      logger.warn("Semantic check failed, treating as unsupported", {
        component,
        claim: logger.preview(claim, LOG_TEXT_PREVIEW_LENGTH),
        error: errorMessage(err),
      });
      return false;
    }
  };
}
