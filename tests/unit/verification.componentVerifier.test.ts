/**
 * Unit tests for per-component verification
 *
 * The semantic checker is a vi.fn stand-in; no completion provider
 */

import { describe, it, expect, vi } from "vitest";
import {
  verifyAction,
  verifyMetric,
  verifyOutcome,
  verifyTool,
} from "@/verification/componentVerifier";
import type { SemanticChecker } from "@/verification/semanticCheck";
import { makeSpan } from "../helpers/fixtures";

const evidence = [
  makeSpan("ev-1", "Led Python development team for 6 years"),
  makeSpan("ev-2", "Delivery speed improved 35% after Agile adoption"),
];

function checker(answer: (evidenceText: string) => boolean) {
  return vi.fn<SemanticChecker>(
    async (_claim, evidenceText) => answer(evidenceText),
  );
}

describe("verifyAction", () => {
  it("should match case-insensitively without a semantic call", async () => {
    const semantic = checker(() => true);
    const result = await verifyAction("LED", evidence, semantic);

    expect(result).toEqual({
      component_name: "action",
      component_text: "LED",
      is_verified: true,
      supporting_evidence: "ev-1",
      verification_method: "exact_match",
      confidence: 1,
      explanation: "Action 'LED' found in evidence",
    });
    expect(semantic).not.toHaveBeenCalled();
  });

  it("should fall back to the first evidence the semantic check accepts", async () => {
    const semantic = checker((text) => text.startsWith("Delivery"));
    const result = await verifyAction("Spearheaded", evidence, semantic);

    expect(result.is_verified).toBe(true);
    expect(result.supporting_evidence).toBe("ev-2");
    expect(result.verification_method).toBe("semantic_match");
    expect(result.confidence).toBe(0.85);
    expect(semantic.mock.calls.map((call) => call[1])).toEqual([
      "Led Python development team for 6 years",
      "Delivery speed improved 35% after Agile adoption",
    ]);
    expect(semantic.mock.calls[0][2]).toBe("action");
  });

  it("should stop at the first accepted evidence", async () => {
    const semantic = checker(() => true);
    await verifyAction("Spearheaded", evidence, semantic);
    expect(semantic).toHaveBeenCalledTimes(1);
  });

  it("should report a certain no_match when nothing supports it", async () => {
    const result = await verifyAction("Spearheaded", evidence, checker(() => false));
    expect(result.is_verified).toBe(false);
    expect(result.supporting_evidence).toBeNull();
    expect(result.verification_method).toBe("no_match");
    expect(result.confidence).toBe(1);
  });

  it("should not verify an empty action", async () => {
    const semantic = checker(() => true);
    const result = await verifyAction("", evidence, semantic);
    expect(result.is_verified).toBe(false);
    expect(semantic).not.toHaveBeenCalled();
  });
});

describe("verifyMetric", () => {
  it("should match the same number in evidence", () => {
    const result = verifyMetric("35%", evidence);
    expect(result.is_verified).toBe(true);
    expect(result.supporting_evidence).toBe("ev-2");
    expect(result.verification_method).toBe("exact_match");
    expect(result.explanation).toBe("Metric value 35 found in evidence");
  });

  it("should reject a number that is not in evidence", () => {
    const result = verifyMetric("50%", evidence);
    expect(result.is_verified).toBe(false);
    expect(result.verification_method).toBe("no_match");
    expect(result.explanation).toBe(
      "Metric '50%' not found in evidence (possible fabrication)",
    );
  });

  it("should require the number as a whole token", () => {
    expect(verifyMetric("35%", [makeSpan("x", "Throughput up 350%")]).is_verified).toBe(
      false,
    );
  });

  it("should accept a trailing .0 in evidence", () => {
    expect(verifyMetric("35%", [makeSpan("x", "Throughput up 35.0%")]).is_verified).toBe(
      true,
    );
  });

  it("should match count phrases on their number", () => {
    const result = verifyMetric("8 engineers", [makeSpan("x", "Managed a team of 8")]);
    expect(result.supporting_evidence).toBe("x");
  });

  it("should accept a placeholder metric when evidence has metrics", () => {
    const result = verifyMetric("[X%]", [
      makeSpan("a", "Mentored interns"),
      makeSpan("b", "Cut costs by $40 per unit"),
    ]);
    expect(result.is_verified).toBe(true);
    expect(result.supporting_evidence).toBe("b");
    expect(result.verification_method).toBe("placeholder_match");
    expect(result.confidence).toBe(0.7);
  });

  it("should reject a placeholder metric when evidence has no metrics", () => {
    const result = verifyMetric("[metric not found]", [makeSpan("a", "Mentored interns")]);
    expect(result.is_verified).toBe(false);
    expect(result.verification_method).toBe("no_match");
  });
});

describe("verifyOutcome", () => {
  it("should keyword-match when two outcome words appear in one evidence text", async () => {
    const semantic = checker(() => true);
    const result = await verifyOutcome(
      "resulting in 35% delivery speedup using Agile",
      evidence,
      semantic,
    );

    expect(result.is_verified).toBe(true);
    expect(result.supporting_evidence).toBe("ev-2");
    expect(result.verification_method).toBe("keyword_match");
    expect(result.confidence).toBe(0.9);
    expect(semantic).not.toHaveBeenCalled();
  });

  it("should fall back to the semantic check", async () => {
    const semantic = checker((text) => text.startsWith("Led"));
    const result = await verifyOutcome("driving team growth", evidence, semantic);

    expect(result.verification_method).toBe("semantic_match");
    expect(result.supporting_evidence).toBe("ev-1");
    expect(semantic.mock.calls[0][2]).toBe("outcome");
  });

  it("should not verify the outcome placeholder", async () => {
    const semantic = checker(() => true);
    const result = await verifyOutcome("[outcome not found]", evidence, semantic);
    expect(result.is_verified).toBe(false);
    expect(semantic).not.toHaveBeenCalled();
  });
});

describe("verifyTool", () => {
  it("should strip the preposition and match case-insensitively", () => {
    const result = verifyTool("using AGILE", evidence);
    expect(result.is_verified).toBe(true);
    expect(result.supporting_evidence).toBe("ev-2");
    expect(result.explanation).toBe("Tool 'AGILE' found in evidence");
  });

  it("should reject tools absent from evidence", () => {
    const result = verifyTool("via Kubernetes", evidence);
    expect(result.is_verified).toBe(false);
    expect(result.explanation).toBe("Tool 'Kubernetes' not found in evidence");
  });

  it("should not verify the tool placeholder", () => {
    expect(verifyTool("[tool not found]", evidence).is_verified).toBe(false);
  });
});
