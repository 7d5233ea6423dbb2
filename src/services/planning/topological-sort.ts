/**
 * Topological Sorter
 *
 * Kahn's algorithm over prerequisite -> dependent edges. Ties are broken by
 * plan order, so the same plan always sorts the same way.
 */

import type { Task, TaskDependency } from '../../models/task.js';
import { CyclicDependencyError, MissingDependencyError } from '../../core/errors.js';
import { detectCycle } from './cycle-detector.js';

/**
 * Orders tasks so that every prerequisite comes before the tasks depending on it.
 *
 * @throws CyclicDependencyError if some tasks could not be emitted
 * @throws MissingDependencyError if an edge references an unknown task
 */
export function topologicalOrder(
  tasks: readonly Task[],
  dependencies: readonly TaskDependency[]
): Task[] {
  const indexById = new Map<string, number>();
  tasks.forEach((task, index) => indexById.set(task.id, index));

  const dependents: number[][] = tasks.map(() => []);
  const inDegree: number[] = tasks.map(() => 0);

  for (const dep of dependencies) {
    const prerequisite = indexById.get(dep.dependsOn);
    const dependent = indexById.get(dep.taskId);
    if (prerequisite === undefined || dependent === undefined) {
      throw new MissingDependencyError(dep.taskId, dep.dependsOn);
    }
    dependents[prerequisite].push(dependent);
    inDegree[dependent]++;
  }

  const queue: number[] = [];
  inDegree.forEach((degree, index) => {
    if (degree === 0) {
      queue.push(index);
    }
  });

  const result: Task[] = [];
  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    result.push(tasks[current]);

    for (const next of dependents[current]) {
      inDegree[next]--;
      if (inDegree[next] === 0) {
        queue.push(next);
      }
    }
  }

  if (result.length < tasks.length) {
    const cycle = detectCycle(tasks.map(t => t.id), dependencies);
    throw new CyclicDependencyError(cycle ?? []);
  }

  return result;
}
