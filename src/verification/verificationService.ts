/**
 * Verification service
 *
 * Parses a bullet and verifies its four components against evidence.
 */

import type {
  BulletVerificationResult,
  CompletionProvider,
  EvidenceSpan,
} from "@/types";
import { DEFAULT_CAPABILITY_TIMEOUT_MS, LOG_TEXT_PREVIEW_LENGTH } from "@/constants";
import { InvalidInputError } from "@/errors";
import * as logger from "@/logger";
import { parseAmot } from "./amotParser";
import { createSemanticChecker, type SemanticChecker } from "./semanticCheck";
import { verifyAction, verifyMetric, verifyOutcome, verifyTool } from "./componentVerifier";
import { buildBulletVerificationResult } from "./bulletAggregator";

export type VerificationServiceOptions = {
  timeoutMs?: number;
};

export class VerificationService {
  private readonly semanticCheck: SemanticChecker;

  constructor(completion: CompletionProvider, options: VerificationServiceOptions = {}) {
    this.semanticCheck = createSemanticChecker(
      completion,
      options.timeoutMs ?? DEFAULT_CAPABILITY_TIMEOUT_MS,
    );
  }

  /**
   * Verify a bullet against evidence.
   *
   * With claimedIds, only the claimed evidence is consulted; when none of
   * the claimed ids exist, all evidence is used instead.
   *
   * @throws {InvalidInputError} Empty bullet text
   */
  async verifyBullet(
    bulletText: string,
    evidence: EvidenceSpan[],
    claimedIds?: string[],
  ): Promise<BulletVerificationResult> {
    if (bulletText.trim().length === 0) {
      throw new InvalidInputError("Bullet text is empty");
    }

    const relevant = this.selectEvidence(bulletText, evidence, claimedIds);
    const components = parseAmot(bulletText);

    const verifications = await Promise.all([
      verifyAction(components.action, relevant, this.semanticCheck),
      verifyMetric(components.metric, relevant),
      verifyOutcome(components.outcome, relevant, this.semanticCheck),
      verifyTool(components.tool, relevant),
    ]);

    const result = buildBulletVerificationResult(bulletText, components, verifications);
    logger.debug("Bullet verified", {
      bullet: logger.preview(bulletText, LOG_TEXT_PREVIEW_LENGTH),
      verified: result.verified_count,
      recommendation: result.recommendation,
    });
    return result;
  }

  private selectEvidence(
    bulletText: string,
    evidence: EvidenceSpan[],
    claimedIds?: string[],
  ): EvidenceSpan[] {
    if (!claimedIds || claimedIds.length === 0) {
      return evidence;
    }

    const claimed = new Set(claimedIds);
    const filtered = evidence.filter((ev) => claimed.has(ev.id));
    if (filtered.length === 0 && evidence.length > 0) {
      logger.warn("None of the claimed evidence ids found, verifying against all evidence", {
        bullet: logger.preview(bulletText, LOG_TEXT_PREVIEW_LENGTH),
        claimedIds,
      });
      return evidence;
    }
    return filtered;
  }
}
