/**
 * Bullet verification type definitions
 */

export type AmotComponentName = "action" | "metric" | "outcome" | "tool";

export type VerificationMethod =
  | "exact_match"
  | "semantic_match"
  | "keyword_match"
  | "placeholder_match"
  | "no_match";

export type Recommendation =
  | "accept"
  | "accept_with_note"
  | "flag_for_review"
  | "reject";

/**
 * Action / Metric / Outcome / Tool parts of a bullet.
 *
 * Missing parts hold a "[... not found]" placeholder instead of being empty.
 */
export type AMOTComponents = {
  action: string;
  metric: string;
  outcome: string;
  tool: string;
  full_text: string;
};

export type ComponentVerification = {
  component_name: AmotComponentName;
  component_text: string;
  is_verified: boolean;
  /** Evidence id backing the component, null when unverified */
  supporting_evidence: string | null;
  verification_method: VerificationMethod;
  confidence: number;
  explanation: string;
};

export type BulletVerificationResult = {
  bullet_text: string;
  amot_components: AMOTComponents;
  /** Always action, metric, outcome, tool in that order */
  component_verifications: ComponentVerification[];
  verified_count: number;
  overall_verification_rate: number;
  is_fully_verified: boolean;
  is_acceptable: boolean;
  recommendation: Recommendation;
  explanation: string;
  evidence_ids: string[];
};
