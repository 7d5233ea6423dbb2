// Task status state machine. `done` is terminal.

import type { Task } from '../../models/task.js';
import type { TaskStatus } from '../../models/types.js';
import { InvalidTransitionError } from '../../core/errors.js';

const TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  todo: ['in_progress', 'blocked'],
  in_progress: ['done', 'blocked'],
  blocked: ['todo', 'in_progress'],
  done: []
};

export function validTransitions(status: TaskStatus): readonly TaskStatus[] {
  return TRANSITIONS[status];
}

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * A terminal status has no successors
 */
export function isTerminal(status: TaskStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

/**
 * Returns a copy of the task with the new status. The input task is never modified.
 *
 * @throws InvalidTransitionError if `to` is not a successor of the current status
 */
export function transition(task: Task, to: TaskStatus): Task {
  if (!canTransition(task.status, to)) {
    throw new InvalidTransitionError(task.status, to, TRANSITIONS[task.status]);
  }

  return { ...task, status: to };
}
