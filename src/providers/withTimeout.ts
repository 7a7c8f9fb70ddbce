/**
 * Per-call timeout for external capabilities
 */

import { CapabilityTimeoutError } from "@/errors";

/**
 * Race a capability call against a timer.
 *
 * The timer is always cleared so a settled call leaves nothing pending.
 *
 * @throws {CapabilityTimeoutError} When the call does not settle in time
 */
export async function withTimeout<T>(
  capability: string,
  timeoutMs: number,
  call: () => Promise<T>,
): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(
      () => reject(new CapabilityTimeoutError(capability, timeoutMs)),
      timeoutMs,
    );
  });

  try {
    return await Promise.race([call(), timeout]);
  } finally {
    clearTimeout(timeoutId);
  }
}
