import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { detectCycle } from './cycle-detector.js';
import type { TaskDependency } from '../../models/task.js';

function edge(taskId: string, dependsOn: string): TaskDependency {
  return { taskId, dependsOn };
}

describe('detectCycle', () => {
  it('should return null for an empty graph', () => {
    expect(detectCycle([], [])).toBeNull();
  });

  it('should return null for isolated tasks', () => {
    expect(detectCycle(['A', 'B', 'C'], [])).toBeNull();
  });

  it('should return null for a dependency chain', () => {
    expect(detectCycle(['A', 'B', 'C'], [edge('A', 'B'), edge('B', 'C')])).toBeNull();
  });

  it('should return null for a diamond', () => {
    const edges = [edge('A', 'B'), edge('A', 'C'), edge('B', 'D'), edge('C', 'D')];
    expect(detectCycle(['A', 'B', 'C', 'D'], edges)).toBeNull();
  });

  it('should walk a chain deeper than the call stack allows', () => {
    const ids = Array.from({ length: 100_000 }, (_, i) => `T${i}`);
    const edges = ids.slice(1).map((id, i) => edge(ids[i], id));

    expect(detectCycle(ids, edges)).toBeNull();
    expect(detectCycle(ids, [...edges, edge(ids[ids.length - 1], 'T0')])).toHaveLength(ids.length + 1);
  });

  it('should report a three-task cycle as a closed walk', () => {
    const edges = [edge('A', 'B'), edge('B', 'C'), edge('C', 'A')];
    expect(detectCycle(['A', 'B', 'C'], edges)).toEqual(['A', 'B', 'C', 'A']);
  });

  it('should report a two-task cycle', () => {
    expect(detectCycle(['A', 'B'], [edge('A', 'B'), edge('B', 'A')])).toEqual(['A', 'B', 'A']);
  });

  it('should start the cycle at the repeated task, not the DFS root', () => {
    const edges = [edge('root', 'A'), edge('A', 'B'), edge('B', 'A')];
    expect(detectCycle(['root', 'A', 'B'], edges)).toEqual(['A', 'B', 'A']);
  });

  it('should find a cycle in a disconnected component', () => {
    const edges = [edge('X', 'Y'), edge('A', 'B'), edge('B', 'A')];
    expect(detectCycle(['X', 'Y', 'A', 'B'], edges)).toEqual(['A', 'B', 'A']);
  });

  it('should report a self-loop', () => {
    expect(detectCycle(['A'], [edge('A', 'A')])).toEqual(['A', 'A']);
  });

  it('should report the same cycle for the same input', () => {
    const ids = ['A', 'B', 'C', 'D'];
    const edges = [edge('A', 'B'), edge('B', 'C'), edge('C', 'D'), edge('D', 'B')];
    expect(detectCycle(ids, edges)).toEqual(detectCycle(ids, edges));
    expect(detectCycle(ids, edges)).toEqual(['B', 'C', 'D', 'B']);
  });

  describe('Property: reported cycles are real', () => {
    const graphArb = fc.integer({ min: 1, max: 8 }).chain(n =>
      fc.tuple(
        fc.constant(Array.from({ length: n }, (_, i) => `T${i}`)),
        fc.array(fc.tuple(fc.nat({ max: n - 1 }), fc.nat({ max: n - 1 })), { maxLength: 16 })
      )
    );

    it('should only report closed walks made of existing edges (property test)', () => {
      fc.assert(
        fc.property(graphArb, ([ids, pairs]) => {
          const edges = pairs.map(([a, b]) => edge(ids[a], ids[b]));
          const cycle = detectCycle(ids, edges);

          if (cycle !== null) {
            expect(cycle.length).toBeGreaterThanOrEqual(2);
            expect(cycle[0]).toBe(cycle[cycle.length - 1]);
            for (let i = 0; i < cycle.length - 1; i++) {
              const exists = edges.some(e => e.taskId === cycle[i] && e.dependsOn === cycle[i + 1]);
              expect(exists).toBe(true);
            }
          }
        })
      );
    });

    it('should never report a cycle when edges only point to earlier tasks (property test)', () => {
      fc.assert(
        fc.property(graphArb, ([ids, pairs]) => {
          const edges = pairs
            .filter(([a, b]) => a !== b)
            .map(([a, b]) => (a > b ? edge(ids[a], ids[b]) : edge(ids[b], ids[a])));
          expect(detectCycle(ids, edges)).toBeNull();
        })
      );
    });
  });
});
