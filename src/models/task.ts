// Task and dependency models

import type { Priority, TaskStatus } from './types.js';

/**
 * A single unit of work inside a plan
 */
export interface Task {
  /** Identifier, unique within its plan */
  readonly id: string;
  /** Title, never empty after trimming */
  readonly title: string;
  readonly description: string;
  readonly status: TaskStatus;
  readonly priority: Priority;
  /** Due date in ISO 8601 format */
  readonly dueDate?: string;
  /** Time estimate in hours, never negative */
  readonly estimateHours?: number;
  readonly tags: readonly string[];
}

/**
 * Edge meaning `taskId` cannot be ready until `dependsOn` is done
 */
export interface TaskDependency {
  readonly taskId: string;
  readonly dependsOn: string;
}

/**
 * Read-only view of tasks and their dependency edges
 */
export interface TaskGraph {
  readonly tasks: readonly Task[];
  readonly dependencies: readonly TaskDependency[];
}
