/**
 * Runtime configuration shape (resolved from environment)
 */

import type { LogLevel } from "./logger";
import type { ProviderKind } from "./providers";

export type AppConfig = {
  provider: ProviderKind;
  openaiApiKey: string | null;
  openaiBaseUrl: string;
  embeddingModel: string;
  completionModel: string;
  capabilityTimeoutMs: number;
  maxBulletsPerRole: number;
  /** null disables persistence */
  dbPath: string | null;
  logLevel: LogLevel;
};
