import { describe, it, expect } from 'vitest';
import { createTask, createDependency, DEFAULT_PRIORITY } from './task-factory.js';
import { SelfDependencyError, ValidationError } from '../../core/errors.js';

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected function to throw');
}

describe('createTask', () => {
  it('should create a task with all fields', () => {
    const task = createTask({
      id: 'task-1',
      title: 'Valid Task',
      description: 'Description',
      status: 'todo',
      priority: 'P1',
      dueDate: '2025-03-01T12:00:00Z',
      estimateHours: 2,
      tags: ['urgent']
    });

    expect(task).toEqual({
      id: 'task-1',
      title: 'Valid Task',
      description: 'Description',
      status: 'todo',
      priority: 'P1',
      dueDate: '2025-03-01T12:00:00Z',
      estimateHours: 2,
      tags: ['urgent']
    });
  });

  it('should apply defaults for optional fields', () => {
    const task = createTask({ id: 'task-1', title: 'Task' });

    expect(task.description).toBe('');
    expect(task.status).toBe('todo');
    expect(task.priority).toBe(DEFAULT_PRIORITY);
    expect(task.tags).toEqual([]);
    expect('dueDate' in task).toBe(false);
    expect('estimateHours' in task).toBe(false);
  });

  it('should trim the title', () => {
    expect(createTask({ id: 'task-1', title: '  Write docs  ' }).title).toBe('Write docs');
  });

  it('should reject empty and whitespace-only titles', () => {
    expect(() => createTask({ id: 'task-1', title: '' })).toThrow(ValidationError);
    expect(() => createTask({ id: 'task-1', title: '   ' })).toThrow(ValidationError);
  });

  it('should report the title field', () => {
    const error = catchError(() => createTask({ id: 'task-1', title: ' ' }));

    expect(error).toBeInstanceOf(ValidationError);
    expect((error as ValidationError).field).toBe('title');
    expect((error as ValidationError).reason).toBe('title cannot be empty');
  });

  it('should reject a negative estimate', () => {
    const error = catchError(() => createTask({ id: 'task-1', title: 'Task', estimateHours: -1 }));

    expect(error).toBeInstanceOf(ValidationError);
    expect((error as ValidationError).field).toBe('estimate_hours');
    expect((error as ValidationError).reason).toBe('estimate cannot be negative');
  });

  it('should reject a non-finite estimate', () => {
    expect(() => createTask({ id: 'task-1', title: 'Task', estimateHours: Number.NaN })).toThrow(ValidationError);
    expect(() => createTask({ id: 'task-1', title: 'Task', estimateHours: Infinity })).toThrow(ValidationError);
  });

  it('should accept a zero estimate', () => {
    expect(createTask({ id: 'task-1', title: 'Task', estimateHours: 0 }).estimateHours).toBe(0);
  });

  it('should reject an empty id', () => {
    expect(() => createTask({ id: '  ', title: 'Task' })).toThrow(ValidationError);
  });

  it('should copy the tags array', () => {
    const tags = ['a'];
    const task = createTask({ id: 'task-1', title: 'Task', tags });
    tags.push('b');
    expect(task.tags).toEqual(['a']);
  });
});

describe('createDependency', () => {
  it('should create an edge between two tasks', () => {
    expect(createDependency('A', 'B')).toEqual({ taskId: 'A', dependsOn: 'B' });
  });

  it('should reject a self-dependency', () => {
    const error = catchError(() => createDependency('A', 'A'));

    expect(error).toBeInstanceOf(SelfDependencyError);
    expect((error as SelfDependencyError).taskId).toBe('A');
    expect((error as SelfDependencyError).message).toBe('Task A cannot depend on itself');
  });
});
