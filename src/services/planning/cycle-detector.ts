/**
 * Cycle Detector
 *
 * Depth-first search over the dependency graph, following each edge from
 * the dependent task to its prerequisite.
 */

import type { TaskDependency } from '../../models/task.js';

/**
 * Finds a cycle in the dependency graph.
 *
 * Every task id is tried as a DFS root, in order, so disconnected components
 * are all checked. The reported cycle is a closed walk: its first and last
 * elements are the same id.
 *
 * @param taskIds - Task ids in plan order
 * @param dependencies - Dependency edges
 * @returns The ids forming a cycle, or null if the graph is acyclic
 */
export function detectCycle(
  taskIds: readonly string[],
  dependencies: readonly TaskDependency[]
): string[] | null {
  const visited = new Set<string>();
  const recursionStack = new Set<string>();
  const path: string[] = [];

  // Build adjacency list: dependent -> prerequisites
  const adjacencyList = new Map<string, string[]>();
  for (const id of taskIds) {
    adjacencyList.set(id, []);
  }
  for (const dep of dependencies) {
    const neighbors = adjacencyList.get(dep.taskId);
    if (neighbors) {
      neighbors.push(dep.dependsOn);
    } else {
      adjacencyList.set(dep.taskId, [dep.dependsOn]);
    }
  }

  // Explicit stack of (node, next neighbor index) frames, so deep chains
  // do not exhaust the call stack
  const frames: Array<{ nodeId: string; next: number }> = [];

  const enter = (nodeId: string): void => {
    visited.add(nodeId);
    recursionStack.add(nodeId);
    path.push(nodeId);
    frames.push({ nodeId, next: 0 });
  };

  for (const id of taskIds) {
    if (visited.has(id)) {
      continue;
    }
    enter(id);

    while (frames.length > 0) {
      const frame = frames[frames.length - 1];
      const neighbors = adjacencyList.get(frame.nodeId) ?? [];

      if (frame.next >= neighbors.length) {
        frames.pop();
        path.pop();
        recursionStack.delete(frame.nodeId);
        continue;
      }

      const neighbor = neighbors[frame.next];
      frame.next++;

      if (!visited.has(neighbor)) {
        enter(neighbor);
      } else if (recursionStack.has(neighbor)) {
        // Back edge: the cycle is the path suffix starting at the repeated node
        const cycleStartIndex = path.indexOf(neighbor);
        return [...path.slice(cycleStartIndex), neighbor];
      }
    }
  }

  return null;
}
