/**
 * Bullet generation constants
 */

export const DEFAULT_MAX_BULLETS_PER_ROLE = 5;

export const GENERATION_MAX_TOKENS = 200;

/** Some variety in phrasing, but not much */
export const GENERATION_TEMPERATURE = 0.7;

export const GENERATION_SYSTEM_PROMPT =
  "You are an expert resume writer who creates AMOT-formatted bullets.";
