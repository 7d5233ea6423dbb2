// Domain-specific error types for the task planner

import type { TaskStatus } from '../models/types.js';

/**
 * Base error class for all planner errors
 */
export abstract class PlannerError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;

  constructor(message: string, public readonly context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context
    };
  }
}

/**
 * A simple field-level precondition failed (empty title, negative estimate)
 */
export class ValidationError extends PlannerError {
  readonly code = 'VALIDATION_ERROR';
  readonly statusCode = 400;

  constructor(public readonly field: string, public readonly reason: string, context?: Record<string, unknown>) {
    super(`Validation failed for field '${field}': ${reason}`, { ...context, field, reason });
  }
}

/**
 * The dependency graph contains a closed walk
 */
export class CyclicDependencyError extends PlannerError {
  readonly code = 'CYCLIC_DEPENDENCY';
  readonly statusCode = 409;

  constructor(public readonly cycle: readonly string[]) {
    super(`Cyclic dependency detected: ${cycle.join(' -> ')}`, { cycle: [...cycle] });
  }
}

/**
 * A status change is not permitted from the current status
 */
export class InvalidTransitionError extends PlannerError {
  readonly code = 'INVALID_TRANSITION';
  readonly statusCode = 409;

  constructor(
    public readonly from: TaskStatus,
    public readonly to: TaskStatus,
    public readonly validTransitions: readonly TaskStatus[]
  ) {
    const valid = validTransitions.length > 0 ? validTransitions.join(', ') : 'none';
    super(`Invalid transition from ${from} to ${to}. Valid transitions: ${valid}`, {
      from,
      to,
      validTransitions: [...validTransitions]
    });
  }
}

/**
 * Two tasks share an identifier within one plan
 */
export class DuplicateIdError extends PlannerError {
  readonly code = 'DUPLICATE_ID';
  readonly statusCode = 409;

  constructor(public readonly id: string) {
    super(`Duplicate task ID: ${id}`, { id });
  }
}

/**
 * An edge references a task id absent from the plan
 */
export class MissingDependencyError extends PlannerError {
  readonly code = 'MISSING_DEPENDENCY';
  readonly statusCode = 400;

  constructor(public readonly taskId: string, public readonly dependencyId: string) {
    super(`Task ${taskId} depends on non-existent task ${dependencyId}`, { taskId, dependencyId });
  }
}

/**
 * An edge whose two endpoints are the same task
 */
export class SelfDependencyError extends PlannerError {
  readonly code = 'SELF_DEPENDENCY';
  readonly statusCode = 400;

  constructor(public readonly taskId: string) {
    super(`Task ${taskId} cannot depend on itself`, { taskId });
  }
}

/**
 * Errors raised by the plan core itself
 */
export type PlanningError =
  | ValidationError
  | CyclicDependencyError
  | InvalidTransitionError
  | DuplicateIdError
  | MissingDependencyError
  | SelfDependencyError;

export function isPlanningError(error: unknown): error is PlanningError {
  return (
    error instanceof ValidationError ||
    error instanceof CyclicDependencyError ||
    error instanceof InvalidTransitionError ||
    error instanceof DuplicateIdError ||
    error instanceof MissingDependencyError ||
    error instanceof SelfDependencyError
  );
}

/**
 * Security errors for path traversal in plan names
 */
export class SecurityError extends PlannerError {
  readonly code = 'SECURITY_ERROR';
  readonly statusCode = 403;
}

/**
 * Not found errors
 */
export class NotFoundError extends PlannerError {
  readonly code = 'NOT_FOUND';
  readonly statusCode = 404;

  constructor(resourceType: string, id: string) {
    super(`${resourceType} not found: ${id}`, { resourceType, id });
  }
}

/**
 * Storage/filesystem errors
 */
export class StorageError extends PlannerError {
  readonly code = 'STORAGE_ERROR';
  readonly statusCode = 500;
}

/**
 * Serialization/parsing errors
 */
export class SerializationError extends PlannerError {
  readonly code = 'SERIALIZATION_ERROR';
  readonly statusCode = 400;
}
