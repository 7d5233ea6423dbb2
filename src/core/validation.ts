// Input validation and sanitization utilities

import { ValidationError, SecurityError } from './errors.js';
import {
  Priority,
  TaskStatus,
  PRIORITIES,
  TASK_STATUSES,
  isPriority,
  isTaskStatus
} from '../models/types.js';

/**
 * Path traversal patterns
 */
const PATH_TRAVERSAL_PATTERNS = [
  /\.\./,           // Parent directory
  /^[/\\]/,         // Absolute path
  /^[a-zA-Z]:/,     // Windows drive letter
  /\0/,             // Null byte
];

const PLAN_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

export const MAX_PLAN_NAME_LENGTH = 64;

/**
 * Trims a title and rejects it when nothing is left
 */
export function validateTitle(title: string, field: string = 'title'): string {
  const trimmed = title.trim();

  if (trimmed.length === 0) {
    throw new ValidationError(field, `${field} cannot be empty`);
  }

  return trimmed;
}

/**
 * Rejects negative or non-finite estimates; absent estimates pass through
 */
export function validateEstimate(estimateHours: number | undefined): number | undefined {
  if (estimateHours === undefined) {
    return undefined;
  }

  if (!Number.isFinite(estimateHours)) {
    throw new ValidationError('estimate_hours', 'estimate must be a finite number');
  }

  if (estimateHours < 0) {
    throw new ValidationError('estimate_hours', 'estimate cannot be negative');
  }

  return estimateHours;
}

/**
 * Validates a stored plan name, which doubles as a file name
 */
export function validatePlanName(name: string): string {
  const trimmed = name.trim();

  if (trimmed.length === 0) {
    throw new ValidationError('name', 'plan name cannot be empty');
  }

  for (const pattern of PATH_TRAVERSAL_PATTERNS) {
    if (pattern.test(trimmed)) {
      throw new SecurityError('Invalid plan name: potential path traversal detected', { name });
    }
  }

  if (trimmed.length > MAX_PLAN_NAME_LENGTH) {
    throw new ValidationError('name', `plan name exceeds maximum length of ${MAX_PLAN_NAME_LENGTH}`);
  }

  if (!PLAN_NAME_PATTERN.test(trimmed)) {
    throw new ValidationError('name', 'plan name may only contain letters, digits, "-" and "_"');
  }

  return trimmed;
}

/**
 * Parses a status typed by a user ("in-progress" and "IN_PROGRESS" are accepted)
 */
export function parseTaskStatus(value: string): TaskStatus {
  const normalized = value.trim().toLowerCase().replace(/-/g, '_');

  if (!isTaskStatus(normalized)) {
    throw new ValidationError(
      'status',
      `invalid status "${value}". Allowed: ${TASK_STATUSES.join(', ')}`
    );
  }

  return normalized;
}

/**
 * Parses a priority typed by a user ("p1" is accepted)
 */
export function parsePriority(value: string): Priority {
  const normalized = value.trim().toUpperCase();

  if (!isPriority(normalized)) {
    throw new ValidationError(
      'priority',
      `invalid priority "${value}". Allowed: ${PRIORITIES.join(', ')}`
    );
  }

  return normalized;
}
