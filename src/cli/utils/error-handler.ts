// CLI error handling utilities

import {
  PlannerError,
  ValidationError,
  SecurityError,
  NotFoundError,
  CyclicDependencyError,
  InvalidTransitionError,
  isPlanningError
} from '../../core/errors.js';
import { logger } from '../../core/logger.js';

/**
 * Format an error for CLI output
 */
export function formatError(error: unknown): string {
  if (error instanceof ValidationError) {
    return `Validation Error (field: ${error.field}): ${error.reason}`;
  }

  if (error instanceof SecurityError) {
    return `Security Error: ${error.message}`;
  }

  if (error instanceof NotFoundError) {
    return `Not Found: ${error.message}`;
  }

  if (error instanceof CyclicDependencyError || error instanceof InvalidTransitionError) {
    return `Planning Error [${error.code}]: ${error.message}`;
  }

  if (error instanceof PlannerError) {
    return `Error [${error.code}]: ${error.message}`;
  }

  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }

  return `Unknown error: ${String(error)}`;
}

/**
 * Process exit code for an error
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ValidationError) {
    return 2;
  }
  if (error instanceof SecurityError) {
    return 3;
  }
  if (error instanceof NotFoundError) {
    return 4;
  }
  if (isPlanningError(error)) {
    return 5;
  }
  return 1;
}

/**
 * Handle CLI errors with proper exit codes
 */
export function handleError(error: unknown): never {
  const message = formatError(error);
  console.error(`\n❌ ${message}\n`);

  if (error instanceof Error) {
    logger.debug('Command failed', { name: error.name, stack: error.stack });
  }

  process.exit(exitCodeFor(error));
}

/**
 * Wrap an async CLI action with error handling
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (error) {
      handleError(error);
    }
  };
}

/**
 * Print success message
 */
export function success(message: string): void {
  console.log(`✓ ${message}`);
}

/**
 * Print info message
 */
export function info(message: string): void {
  console.log(`ℹ ${message}`);
}
