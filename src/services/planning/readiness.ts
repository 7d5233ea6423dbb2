/**
 * Readiness & Progress Calculator
 *
 * Derives ready, blocked and overdue tasks plus completion metrics from
 * task statuses and dependency edges.
 */

import type { Task, TaskGraph } from '../../models/task.js';
import type { TaskStatus } from '../../models/types.js';

/**
 * Aggregate progress of a plan
 */
export interface ProgressSummary {
  total: number;
  byStatus: Record<TaskStatus, number>;
  /** 0 to 100 */
  completionPercentage: number;
  remaining: number;
  totalEstimateHours: number;
  remainingEstimateHours: number;
  ready: number;
  blocked: number;
  overdue: number;
  /** True when the plan has tasks and all of them are done */
  isComplete: boolean;
}

/**
 * Tasks that are todo or in progress and whose prerequisites are all done.
 * A task without dependencies is ready.
 */
export function readyTasks(graph: TaskGraph): Task[] {
  const statusById = new Map<string, TaskStatus>();
  for (const task of graph.tasks) {
    statusById.set(task.id, task.status);
  }

  const prerequisites = new Map<string, string[]>();
  for (const dep of graph.dependencies) {
    const list = prerequisites.get(dep.taskId);
    if (list) {
      list.push(dep.dependsOn);
    } else {
      prerequisites.set(dep.taskId, [dep.dependsOn]);
    }
  }

  return graph.tasks.filter(task => {
    if (task.status !== 'todo' && task.status !== 'in_progress') {
      return false;
    }
    const required = prerequisites.get(task.id) ?? [];
    return required.every(id => statusById.get(id) === 'done');
  });
}

/**
 * Tasks whose status is `blocked`. Unmet dependencies alone do not make a task blocked.
 */
export function blockedTasks(graph: TaskGraph): Task[] {
  return graph.tasks.filter(task => task.status === 'blocked');
}

export function completionPercentage(graph: TaskGraph): number {
  if (graph.tasks.length === 0) {
    return 0;
  }

  const doneCount = graph.tasks.filter(task => task.status === 'done').length;
  return (doneCount / graph.tasks.length) * 100;
}

/**
 * Sum of estimates; tasks without one count as zero
 */
export function totalEstimate(tasks: readonly Task[]): number {
  return tasks.reduce((sum, task) => sum + (task.estimateHours ?? 0), 0);
}

/**
 * A task is overdue when it is not done and its due date is before `now`.
 * Unparseable due dates are never overdue.
 */
export function isOverdue(task: Task, now: Date): boolean {
  if (task.status === 'done' || task.dueDate === undefined) {
    return false;
  }

  const due = Date.parse(task.dueDate);
  if (Number.isNaN(due)) {
    return false;
  }

  return due < now.getTime();
}

export function overdueTasks(graph: TaskGraph, now: Date): Task[] {
  return graph.tasks.filter(task => isOverdue(task, now));
}

export function progressSummary(graph: TaskGraph, now: Date): ProgressSummary {
  const byStatus: Record<TaskStatus, number> = { todo: 0, in_progress: 0, done: 0, blocked: 0 };

  for (const task of graph.tasks) {
    byStatus[task.status]++;
  }

  const total = graph.tasks.length;
  const unfinished = graph.tasks.filter(task => task.status !== 'done');

  return {
    total,
    byStatus,
    completionPercentage: completionPercentage(graph),
    remaining: unfinished.length,
    totalEstimateHours: totalEstimate(graph.tasks),
    remainingEstimateHours: totalEstimate(unfinished),
    ready: readyTasks(graph).length,
    blocked: blockedTasks(graph).length,
    overdue: overdueTasks(graph, now).length,
    isComplete: total > 0 && byStatus.done === total
  };
}
