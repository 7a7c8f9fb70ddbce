/**
 * Component verifier
 *
 * Checks each AMOT component against evidence spans. Exact and keyword
 * checks come first; only action and outcome may fall back to a
 * semantic check, evaluated one evidence item at a time.
 */

import type { ComponentVerification, EvidenceSpan } from "@/types";
import {
  CONFIDENCE,
  EVIDENCE_NUMERIC_PATTERN,
  METRIC_NUMBER_PATTERN,
  OUTCOME_MIN_KEYWORD_OVERLAP,
  TOOL_PREPOSITION_PATTERN,
} from "@/constants";
import { escapeRegExp, lowercaseWords } from "@/utils";
import { isPlaceholder } from "./amotParser";
import type { SemanticChecker } from "./semanticCheck";

function noMatch(
  name: ComponentVerification["component_name"],
  text: string,
  explanation: string,
): ComponentVerification {
  return {
    component_name: name,
    component_text: text,
    is_verified: false,
    supporting_evidence: null,
    verification_method: "no_match",
    confidence: CONFIDENCE.noMatch,
    explanation,
  };
}

function containsIgnoreCase(haystack: string, needle: string): boolean {
  return haystack.toLowerCase().includes(needle.toLowerCase());
}

/**
 * First evidence item the semantic checker accepts
 */
async function firstSemanticMatch(
  claim: string,
  evidence: EvidenceSpan[],
  component: "action" | "outcome",
  semanticCheck: SemanticChecker,
): Promise<EvidenceSpan | undefined> {
  for (const ev of evidence) {
    if (await semanticCheck(claim, ev.text, component)) {
      return ev;
    }
  }
  return undefined;
}

export async function verifyAction(
  action: string,
  evidence: EvidenceSpan[],
  semanticCheck: SemanticChecker,
): Promise<ComponentVerification> {
  if (isPlaceholder(action)) {
    return noMatch("action", action, "No action verb in bullet");
  }

  const exact = evidence.find((ev) => containsIgnoreCase(ev.text, action));
  if (exact) {
    return {
      component_name: "action",
      component_text: action,
      is_verified: true,
      supporting_evidence: exact.id,
      verification_method: "exact_match",
      confidence: CONFIDENCE.exact,
      explanation: `Action '${action}' found in evidence`,
    };
  }

  const semantic = await firstSemanticMatch(action, evidence, "action", semanticCheck);
  if (semantic) {
    return {
      component_name: "action",
      component_text: action,
      is_verified: true,
      supporting_evidence: semantic.id,
      verification_method: "semantic_match",
      confidence: CONFIDENCE.semantic,
      explanation: `Action '${action}' is supported by evidence`,
    };
  }

  return noMatch("action", action, `Action '${action}' not found in evidence`);
}

/**
 * Metrics are matched on their numbers only. A bullet without numbers
 * passes as a placeholder when the evidence carries some metric.
 */
export function verifyMetric(metric: string, evidence: EvidenceSpan[]): ComponentVerification {
  const numbers = metric.match(METRIC_NUMBER_PATTERN) ?? [];

  if (numbers.length === 0) {
    const numeric = evidence.find((ev) => EVIDENCE_NUMERIC_PATTERN.test(ev.text));
    if (numeric) {
      return {
        component_name: "metric",
        component_text: metric,
        is_verified: true,
        supporting_evidence: numeric.id,
        verification_method: "placeholder_match",
        confidence: CONFIDENCE.placeholder,
        explanation: "Bullet has no concrete metric; evidence contains metrics to fill in",
      };
    }
    return noMatch("metric", metric, "No metric in bullet or evidence");
  }

  for (const ev of evidence) {
    for (const num of numbers) {
      if (new RegExp(`\\b${escapeRegExp(num)}(?:\\.0+)?\\b`).test(ev.text)) {
        return {
          component_name: "metric",
          component_text: metric,
          is_verified: true,
          supporting_evidence: ev.id,
          verification_method: "exact_match",
          confidence: CONFIDENCE.exact,
          explanation: `Metric value ${num} found in evidence`,
        };
      }
    }
  }

  return noMatch("metric", metric, `Metric '${metric}' not found in evidence (possible fabrication)`);
}

export async function verifyOutcome(
  outcome: string,
  evidence: EvidenceSpan[],
  semanticCheck: SemanticChecker,
): Promise<ComponentVerification> {
  if (isPlaceholder(outcome)) {
    return noMatch("outcome", outcome, "No outcome phrase in bullet");
  }

  const words = lowercaseWords(outcome);
  const keyword = evidence.find((ev) => {
    const text = ev.text.toLowerCase();
    return words.filter((word) => text.includes(word)).length >= OUTCOME_MIN_KEYWORD_OVERLAP;
  });
  if (keyword) {
    return {
      component_name: "outcome",
      component_text: outcome,
      is_verified: true,
      supporting_evidence: keyword.id,
      verification_method: "keyword_match",
      confidence: CONFIDENCE.keyword,
      explanation: "Outcome keywords found in evidence",
    };
  }

  const semantic = await firstSemanticMatch(outcome, evidence, "outcome", semanticCheck);
  if (semantic) {
    return {
      component_name: "outcome",
      component_text: outcome,
      is_verified: true,
      supporting_evidence: semantic.id,
      verification_method: "semantic_match",
      confidence: CONFIDENCE.semantic,
      explanation: "Outcome is supported by evidence",
    };
  }

  return noMatch("outcome", outcome, "Outcome not supported by evidence");
}

/**
 * Tools must be named in the evidence; no semantic fallback.
 */
export function verifyTool(tool: string, evidence: EvidenceSpan[]): ComponentVerification {
  if (isPlaceholder(tool)) {
    return noMatch("tool", tool, "No tool or method in bullet");
  }

  const name = tool.replace(TOOL_PREPOSITION_PATTERN, "").trim();
  if (name.length === 0) {
    return noMatch("tool", tool, "No tool or method in bullet");
  }

  const exact = evidence.find((ev) => containsIgnoreCase(ev.text, name));
  if (exact) {
    return {
      component_name: "tool",
      component_text: tool,
      is_verified: true,
      supporting_evidence: exact.id,
      verification_method: "exact_match",
      confidence: CONFIDENCE.exact,
      explanation: `Tool '${name}' found in evidence`,
    };
  }

  return noMatch("tool", tool, `Tool '${name}' not found in evidence`);
}
