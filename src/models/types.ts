// Core type definitions for the task planner

// Status Types
export type TaskStatus = 'todo' | 'in_progress' | 'done' | 'blocked';

// Priority levels, P0 is the most severe
export type Priority = 'P0' | 'P1' | 'P2' | 'P3';

export const TASK_STATUSES: readonly TaskStatus[] = ['todo', 'in_progress', 'done', 'blocked'];

export const PRIORITIES: readonly Priority[] = ['P0', 'P1', 'P2', 'P3'];

/**
 * Orders priorities from most to least severe (P0 first).
 * Only used for display and sorting, never for scheduling.
 */
export function comparePriority(a: Priority, b: Priority): number {
  return PRIORITIES.indexOf(a) - PRIORITIES.indexOf(b);
}

export function isTaskStatus(value: string): value is TaskStatus {
  return TASK_STATUSES.some(status => status === value);
}

export function isPriority(value: string): value is Priority {
  return PRIORITIES.some(priority => priority === value);
}
