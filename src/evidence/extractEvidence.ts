/**
 * Evidence extraction
 *
 * Flattens a profile into EvidenceSpans with stable ids. Order is fixed
 * (experiences, projects, education, certifications) because similarity
 * ties are broken by evidence order.
 */

import type { EvidenceSpan, Profile } from "@/types";
import { InvalidInputError } from "@/errors";

/**
 * Positional evidence id, falling back to a derived one
 */
function evidenceIdAt(ids: string[], index: number, fallback: string): string {
  const id = ids[index]?.trim();
  return id ? id : fallback;
}

function isBlank(text: string): boolean {
  return text.trim().length === 0;
}

/**
 * Extract every evidence span from a profile.
 *
 * - Experience bullets: id from evidence_ids[i] or "<expId>-bullet-<i>"
 * - Project description: "<projId>-desc"
 * - Project achievements: evidence_ids[i] or "<projId>-achievement-<i>"
 * - Education degree: "<eduId>-degree" ("<degree> from <institution>")
 * - Coursework: "<eduId>-course-<i>"
 * - Certifications: "<certId>-cert" ("<name> from <issuer>")
 *
 * Blank texts are skipped.
 *
 * @throws {InvalidInputError} If two spans end up with the same id
 */
export function extractEvidence(profile: Profile): EvidenceSpan[] {
  const spans: EvidenceSpan[] = [];

  for (const exp of profile.experiences) {
    exp.bullets.forEach((bullet, i) => {
      if (isBlank(bullet)) return;
      spans.push({
        id: evidenceIdAt(exp.evidence_ids, i, `${exp.id}-bullet-${i}`),
        source_type: "experience",
        source_id: exp.id,
        text: bullet,
        category: "work_achievement",
      });
    });
  }

  for (const project of profile.projects) {
    if (!isBlank(project.description)) {
      spans.push({
        id: `${project.id}-desc`,
        source_type: "project",
        source_id: project.id,
        text: project.description,
        category: "project_description",
      });
    }
    project.achievements.forEach((achievement, i) => {
      if (isBlank(achievement)) return;
      spans.push({
        id: evidenceIdAt(project.evidence_ids, i, `${project.id}-achievement-${i}`),
        source_type: "project",
        source_id: project.id,
        text: achievement,
        category: "project_achievement",
      });
    });
  }

  for (const edu of profile.education) {
    spans.push({
      id: `${edu.id}-degree`,
      source_type: "education",
      source_id: edu.id,
      text: `${edu.degree} from ${edu.institution}`,
      category: "education_credential",
    });
    edu.relevant_coursework.forEach((course, i) => {
      if (isBlank(course)) return;
      spans.push({
        id: `${edu.id}-course-${i}`,
        source_type: "education",
        source_id: edu.id,
        text: course,
        category: "education_coursework",
      });
    });
  }

  for (const cert of profile.certifications) {
    spans.push({
      id: `${cert.id}-cert`,
      source_type: "certification",
      source_id: cert.id,
      text: `${cert.name} from ${cert.issuer}`,
      category: "certification",
    });
  }

  const seen = new Set<string>();
  for (const span of spans) {
    if (seen.has(span.id)) {
      throw new InvalidInputError(`Duplicate evidence id "${span.id}" in profile ${profile.id}`);
    }
    seen.add(span.id);
  }

  return spans;
}

/**
 * Return copies of the spans with embeddings attached (order-preserving)
 */
export function attachEmbeddings(
  spans: EvidenceSpan[],
  embeddings: number[][],
): EvidenceSpan[] {
  if (spans.length !== embeddings.length) {
    throw new InvalidInputError(
      `Got ${embeddings.length} embeddings for ${spans.length} evidence spans`,
    );
  }
  return spans.map((span, i) => ({ ...span, embedding: embeddings[i] }));
}
