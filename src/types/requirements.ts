/**
 * Job requirement type definitions
 *
 * Requirements are extracted from a job description upstream and are
 * treated as immutable for the duration of an analysis run.
 */

export type RequirementCategory =
  | "technical"
  | "soft_skill"
  | "experience"
  | "certification"
  | "other";

export type RequirementPriority = "must_have" | "nice_to_have";

/**
 * Single requirement from a job description.
 */
export type Requirement = {
  /** Requirement as stated in the posting (e.g. "5+ years Python experience") */
  text: string;
  category: RequirementCategory;
  priority: RequirementPriority;
  /** Key terms for matching (tech stack, skills) */
  keywords: string[];
};

/**
 * Structured job description.
 *
 * Only the fields the coverage pipeline reads are required; the rest is
 * carried through for reporting.
 */
export type ExtractedJD = {
  title: string;
  company?: string | null;
  location?: string | null;
  must_have_requirements: Requirement[];
  nice_to_have_requirements: Requirement[];
  required_keywords?: string[];
  raw_text: string;
};
