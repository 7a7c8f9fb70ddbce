/**
 * Bullet generation prompt
 */

import type { EvidenceMatch } from "@/types";

/**
 * Prompt restricted to the requirement and its top evidence; nothing
 * else from the profile reaches the model.
 */
export function buildGenerationPrompt(
  requirementText: string,
  evidence: EvidenceMatch[],
): string {
  const evidenceLines = evidence.map((ev) => `- ${ev.evidence_text}`);

  return [
    "Generate a resume bullet that addresses this job requirement:",
    "",
    `Requirement: ${requirementText}`,
    "",
    "Use ONLY information from this evidence:",
    ...evidenceLines,
    "",
    "Format: Action verb + what you did + metric (if available) + outcome + tool/method",
    "Do not invent numbers, tools or outcomes that are not in the evidence.",
    "",
    "Generate ONE bullet (nothing else):",
  ].join("\n");
}
