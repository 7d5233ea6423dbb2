/**
 * Tests for the task status state machine
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { canTransition, isTerminal, transition, validTransitions } from './status-machine.js';
import { createTask } from './task-factory.js';
import { InvalidTransitionError } from '../../core/errors.js';
import { TASK_STATUSES, TaskStatus } from '../../models/types.js';

const ALLOWED: Array<[TaskStatus, TaskStatus]> = [
  ['todo', 'in_progress'],
  ['todo', 'blocked'],
  ['in_progress', 'done'],
  ['in_progress', 'blocked'],
  ['blocked', 'todo'],
  ['blocked', 'in_progress']
];

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected function to throw');
}

function isAllowed(from: TaskStatus, to: TaskStatus): boolean {
  return ALLOWED.some(([a, b]) => a === from && b === to);
}

describe('status machine', () => {
  describe('validTransitions', () => {
    it('should list the successors of each status', () => {
      expect(validTransitions('todo')).toEqual(['in_progress', 'blocked']);
      expect(validTransitions('in_progress')).toEqual(['done', 'blocked']);
      expect(validTransitions('blocked')).toEqual(['todo', 'in_progress']);
      expect(validTransitions('done')).toEqual([]);
    });
  });

  describe('canTransition', () => {
    const pairs: Array<[TaskStatus, TaskStatus]> = TASK_STATUSES.flatMap(from =>
      TASK_STATUSES.map((to): [TaskStatus, TaskStatus] => [from, to])
    );

    it.each(pairs)('%s -> %s', (from, to) => {
      expect(canTransition(from, to)).toBe(isAllowed(from, to));
    });
  });

  describe('isTerminal', () => {
    it('should only treat done as terminal', () => {
      expect(TASK_STATUSES.filter(isTerminal)).toEqual(['done']);
    });
  });

  describe('transition', () => {
    it('should move todo to in_progress', () => {
      const task = createTask({ id: 'task-1', title: 'Task' });
      const updated = transition(task, 'in_progress');

      expect(updated.status).toBe('in_progress');
      expect(updated).toEqual({ ...task, status: 'in_progress' });
    });

    it('should leave the original task untouched', () => {
      const task = createTask({ id: 'task-1', title: 'Task' });
      transition(task, 'blocked');
      expect(task.status).toBe('todo');
    });

    it('should refuse done -> todo with structured context', () => {
      const task = createTask({ id: 'task-1', title: 'Task', status: 'done' });

      const error = catchError(() => transition(task, 'todo'));

      expect(error).toBeInstanceOf(InvalidTransitionError);
      const err = error as InvalidTransitionError;
      expect(err.from).toBe('done');
      expect(err.to).toBe('todo');
      expect(err.validTransitions).toEqual([]);
      expect(err.message).toBe('Invalid transition from done to todo. Valid transitions: none');
      expect(task.status).toBe('done');
    });

    it('should list valid transitions in the error message', () => {
      const task = createTask({ id: 'task-1', title: 'Task' });
      expect(() => transition(task, 'done')).toThrow(
        'Invalid transition from todo to done. Valid transitions: in_progress, blocked'
      );
    });
  });

  describe('Property: illegal transitions never change the task', () => {
    const statusArb = fc.constantFrom<TaskStatus>(...TASK_STATUSES);

    it('should succeed exactly when the target is a valid successor (property test)', () => {
      fc.assert(
        fc.property(statusArb, statusArb, (from, to) => {
          const task = createTask({ id: 'task-1', title: 'Task', status: from });
          const snapshot = { ...task };

          if (canTransition(from, to)) {
            expect(transition(task, to).status).toBe(to);
          } else {
            expect(() => transition(task, to)).toThrow(InvalidTransitionError);
          }
          expect(task).toEqual(snapshot);
        })
      );
    });

    it('should reject every transition out of done (property test)', () => {
      fc.assert(
        fc.property(statusArb, to => {
          const task = createTask({ id: 'task-1', title: 'Task', status: 'done' });
          expect(() => transition(task, to)).toThrow(InvalidTransitionError);
        })
      );
    });
  });
});
