import { errorMessage } from '@relay/core';
import type { Logger } from '@relay/utils';

/**
 * Run a side-effecting chat call whose failure must not affect the caller.
 *
 * Never throws. Failures are logged at warn; the result says whether
 * the call went through.
 */
export async function bestEffort(
  logger: Logger,
  action: string,
  fn: () => Promise<unknown>
): Promise<boolean> {
  try {
    await fn();
    return true;
  } catch (error) {
    logger.warn({ action, error: errorMessage(error) }, 'Best-effort chat call failed');
    return false;
  }
}
