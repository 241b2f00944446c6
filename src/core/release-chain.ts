/**
 * Ordered teardown where every step runs regardless of earlier failures.
 */

import type { Logger } from "../interfaces/logger.js";

export interface ReleaseStep {
  name: string;
  release: () => void | Promise<void>;
}

export interface ReleaseFailure {
  step: string;
  error: unknown;
}

export async function releaseInOrder(
  steps: readonly ReleaseStep[],
  logger: Logger,
): Promise<ReleaseFailure[]> {
  const failures: ReleaseFailure[] = [];
  for (const step of steps) {
    try {
      await step.release();
    } catch (error) {
      logger.warn(`Failed to release ${step.name}`, { error });
      failures.push({ step: step.name, error });
    }
  }
  return failures;
}
