#!/usr/bin/env node
/**
 * CLI entrypoint
 *
 * Usage:
 *   node dist/main.js <profile.json> <job.json> [--job-id <id>] [--generate]
 *
 * Environment variables:
 *   - PROVIDER: mock (default) or openai
 *   - OPENAI_API_KEY, OPENAI_BASE_URL, EMBEDDING_MODEL, COMPLETION_MODEL
 *   - CAPABILITY_TIMEOUT_MS, MAX_BULLETS_PER_ROLE
 *   - DB_PATH: persist results to this SQLite file (optional)
 *   - LOG_LEVEL: debug, info, warn, error
 */

import "dotenv/config";
import { loadConfig } from "./config";
import { createProviders } from "./providers";
import { parseCliArgs, runTailor } from "./cli";
import { getVerificationStats } from "./generation";
import * as logger from "./logger";

async function main() {
  const args = parseCliArgs(process.argv.slice(2));
  const config = loadConfig();
  logger.setLogLevel(config.logLevel);
  const providers = createProviders(config);

  const result = await runTailor(args, config, providers);

  if (result.generation) {
    const stats = getVerificationStats(result.generation);
    logger.info("Generation summary", { ...stats, draftId: result.draftId });
    for (const bullet of result.generation.proposed_bullets) {
      logger.info("Proposed bullet", { text: bullet.text, rate: bullet.verification_rate });
    }
    for (const bullet of result.generation.suggested_edits) {
      logger.info("Suggested edit", {
        text: bullet.text,
        explanation: bullet.verification.explanation,
      });
    }
  }
}

main().catch((error: unknown) => {
  const err = error instanceof Error ? error : new Error(String(error));
  logger.error("Fatal error", { error: err.message, name: err.name });
  process.exit(1);
});
