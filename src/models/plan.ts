// Persisted plan shape

import type { Priority, TaskStatus } from './types.js';

/**
 * Task record as it appears in a plan file
 */
export interface TaskRecord {
  id: string;
  title: string;
  description: string;
  status: TaskStatus;
  priority: Priority;
  due_date?: string;
  estimate_hours?: number;
  tags: string[];
}

/**
 * Dependency record as it appears in a plan file
 */
export interface DependencyRecord {
  task_id: string;
  depends_on: string;
}

/**
 * Serialized plan, the JSON object stored on disk
 */
export interface PlanRecord {
  title: string;
  description: string;
  tasks: TaskRecord[];
  dependencies: DependencyRecord[];
}
