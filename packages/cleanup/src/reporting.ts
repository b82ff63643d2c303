import type { Logger } from '@retry-rounds/logging';

export type DeleteOutcome = 'deleted' | 'not_found' | 'completed_with_errors';

export const DEFAULT_MAX_ATTEMPTS = 5;

/**
 * Log one failed deletion round of a component
 */
export function reportDeletionFailure(
  logger: Logger,
  error: unknown,
  componentName: string,
  attemptNumber: number
): void {
  logger.error('The following failure was raised during deletion', error, {
    component: componentName,
    attempt: attemptNumber,
  });
}

/**
 * Log a failed component deletion and decide whether to give up on it.
 * @returns true once `attemptNumber` reaches `maxAttempts`
 */
export function reportComponentFailure(
  logger: Logger,
  error: unknown,
  componentName: string,
  attemptNumber: number,
  maxAttempts: number = DEFAULT_MAX_ATTEMPTS
): boolean {
  reportDeletionFailure(logger, error, componentName, attemptNumber);

  if (attemptNumber >= maxAttempts) {
    logger.error(`Too many attempts to delete '${componentName}'. Giving up.`);
    return true;
  }

  logger.debug(`Retrying deletion for '${componentName}'...`);
  return false;
}

/**
 * Log the overall result of deleting a store
 */
export function reportDeleteOutcome(
  logger: Logger,
  locator: string,
  existed: boolean,
  failed: boolean
): DeleteOutcome {
  if (!existed) {
    logger.info(`No store found at location '${locator}'.`);
    return 'not_found';
  }

  if (failed) {
    logger.error(
      `Completed store deletion at location '${locator}' with errors, see log for details.`
    );
    return 'completed_with_errors';
  }

  logger.info(`Successfully deleted store at location '${locator}'.`);
  return 'deleted';
}
