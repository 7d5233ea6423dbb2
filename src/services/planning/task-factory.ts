// Task and dependency construction with field-level validation

import type { Task, TaskDependency } from '../../models/task.js';
import type { Priority, TaskStatus } from '../../models/types.js';
import { SelfDependencyError, ValidationError } from '../../core/errors.js';
import { validateEstimate, validateTitle } from '../../core/validation.js';

/**
 * Data for creating a task
 */
export interface CreateTaskData {
  id: string;
  title: string;
  description?: string;
  status?: TaskStatus;
  priority?: Priority;
  dueDate?: string;
  estimateHours?: number;
  tags?: readonly string[];
}

export const DEFAULT_PRIORITY: Priority = 'P2';

/**
 * Creates a task, trimming the title.
 *
 * @throws ValidationError if the id or title is empty or the estimate is negative
 */
export function createTask(data: CreateTaskData): Task {
  if (data.id.trim().length === 0) {
    throw new ValidationError('id', 'task id cannot be empty');
  }

  const title = validateTitle(data.title);
  const estimateHours = validateEstimate(data.estimateHours);

  return {
    id: data.id,
    title,
    description: data.description ?? '',
    status: data.status ?? 'todo',
    priority: data.priority ?? DEFAULT_PRIORITY,
    ...(data.dueDate !== undefined ? { dueDate: data.dueDate } : {}),
    ...(estimateHours !== undefined ? { estimateHours } : {}),
    tags: [...(data.tags ?? [])]
  };
}

/**
 * Creates a dependency edge: `taskId` depends on `dependsOn`.
 *
 * @throws SelfDependencyError if both ids are the same
 */
export function createDependency(taskId: string, dependsOn: string): TaskDependency {
  if (taskId === dependsOn) {
    throw new SelfDependencyError(taskId);
  }

  return { taskId, dependsOn };
}
