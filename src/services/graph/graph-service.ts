/**
 * Graph Service
 *
 * Generates plan dependency graph visualizations in Mermaid
 * and DOT formats with status styling.
 */

import type { Task, TaskDependency } from '../../models/task.js';
import type { TaskStatus } from '../../models/types.js';
import type { Plan } from '../planning/plan.js';

/**
 * Graph output format options
 */
export type GraphFormat = 'mermaid' | 'dot';

export const GRAPH_FORMATS: readonly GraphFormat[] = ['mermaid', 'dot'];

/**
 * Options for graph generation
 */
export interface GraphOptions {
  format: GraphFormat;
  /** Only render tasks connected to this task */
  rootId?: string;
  /** Outline tasks that are ready to start */
  highlightReady?: boolean;
}

/**
 * Colour per status (DOT)
 */
const DOT_STATUS_COLORS: Record<TaskStatus, string> = {
  todo: 'gray40',
  in_progress: 'blue',
  done: 'green',
  blocked: 'red'
};

/**
 * Status to style mapping for DOT
 */
const DOT_STATUS_STYLES: Record<TaskStatus, string> = {
  todo: 'style=solid',
  in_progress: 'style=bold',
  done: 'style=filled, fillcolor=palegreen',
  blocked: 'style=dashed'
};

/**
 * Graph Service Interface
 */
export interface IGraphService {
  generateGraph(plan: Plan, options?: GraphOptions): string;
  getConnectedTasks(plan: Plan, rootId: string): string[];
}

export function isGraphFormat(value: string): value is GraphFormat {
  return GRAPH_FORMATS.some(format => format === value);
}

/**
 * Graph Service Implementation
 */
export class GraphService implements IGraphService {
  /**
   * Generates a graph of the plan's tasks. Edges point from a prerequisite
   * to the task that depends on it, so the graph reads in execution order.
   */
  generateGraph(plan: Plan, options?: GraphOptions): string {
    const format = options?.format ?? 'mermaid';
    const rootId = options?.rootId;

    let tasks: readonly Task[] = plan.tasks;
    let edges: readonly TaskDependency[] = plan.dependencies;

    if (rootId) {
      const taskIds = new Set([rootId, ...this.getConnectedTasks(plan, rootId)]);
      tasks = tasks.filter(t => taskIds.has(t.id));
      edges = edges.filter(e => taskIds.has(e.taskId) && taskIds.has(e.dependsOn));
    }

    const readyIds = new Set(
      options?.highlightReady ? plan.readyTasks().map(t => t.id) : []
    );
    // Assigned over the whole plan so a task keeps its node id in rooted views
    const nodeIds = this.assignNodeIds(plan.tasks);

    if (format === 'mermaid') {
      return this.generateMermaidGraph(tasks, edges, readyIds, nodeIds);
    } else {
      return this.generateDotGraph(tasks, edges, readyIds, nodeIds);
    }
  }

  /**
   * Gets all tasks connected to a root task, following edges in both directions
   *
   * @returns Connected task IDs, excluding the root
   */
  getConnectedTasks(plan: Plan, rootId: string): string[] {
    const visited = new Set<string>();
    const queue: string[] = [rootId];

    while (queue.length > 0) {
      const currentId = queue.shift();
      if (currentId === undefined || visited.has(currentId)) {
        continue;
      }
      visited.add(currentId);

      for (const task of plan.prerequisitesOf(currentId)) {
        if (!visited.has(task.id)) {
          queue.push(task.id);
        }
      }
      for (const task of plan.dependentsOf(currentId)) {
        if (!visited.has(task.id)) {
          queue.push(task.id);
        }
      }
    }

    visited.delete(rootId);
    return Array.from(visited);
  }

  /**
   * Generates Mermaid flowchart syntax
   */
  private generateMermaidGraph(
    tasks: readonly Task[],
    edges: readonly TaskDependency[],
    readyIds: Set<string>,
    nodeIds: Map<string, string>
  ): string {
    const nodeId = (taskId: string): string => nodeIds.get(taskId) ?? this.sanitizeNodeId(taskId);
    const lines: string[] = ['graph TB'];

    lines.push('');
    lines.push('%% Style definitions');
    lines.push('classDef todo fill:#ecf0f1,stroke:#95a5a6,color:#2c3e50');
    lines.push('classDef in_progress fill:#3498db,stroke:#2980b9,color:#fff');
    lines.push('classDef done fill:#27ae60,stroke:#229954,color:#fff');
    lines.push('classDef blocked fill:#e74c3c,stroke:#c0392b,color:#fff');
    lines.push('classDef ready stroke-width:3px');
    lines.push('');

    lines.push('%% Nodes');
    for (const task of tasks) {
      const safeTitle = this.escapeMermaidText(task.title);
      lines.push(`${nodeId(task.id)}["${task.id}: ${safeTitle}"]`);
    }
    lines.push('');

    if (edges.length > 0) {
      lines.push('%% Edges');
      for (const edge of edges) {
        lines.push(`${nodeId(edge.dependsOn)} --> ${nodeId(edge.taskId)}`);
      }
      lines.push('');
    }

    lines.push('%% Apply styles');
    for (const task of tasks) {
      lines.push(`class ${nodeId(task.id)} ${task.status}`);
      if (readyIds.has(task.id)) {
        lines.push(`class ${nodeId(task.id)} ready`);
      }
    }

    return lines.join('\n');
  }

  /**
   * Generates Graphviz DOT syntax
   */
  private generateDotGraph(
    tasks: readonly Task[],
    edges: readonly TaskDependency[],
    readyIds: Set<string>,
    nodeIds: Map<string, string>
  ): string {
    const nodeId = (taskId: string): string => nodeIds.get(taskId) ?? this.sanitizeNodeId(taskId);
    const lines: string[] = ['digraph G {'];
    lines.push('  rankdir=TB;');
    lines.push('  node [shape=box];');
    lines.push('');

    for (const task of tasks) {
      const safeTitle = this.escapeDotText(task.title);
      const color = DOT_STATUS_COLORS[task.status];
      const statusStyle = DOT_STATUS_STYLES[task.status];
      const penwidth = readyIds.has(task.id) ? ', penwidth=3' : '';

      lines.push(`  ${nodeId(task.id)} [label="${task.id} [${task.priority}]\\n${safeTitle}", color=${color}, ${statusStyle}${penwidth}];`);
    }
    lines.push('');

    for (const edge of edges) {
      lines.push(`  ${nodeId(edge.dependsOn)} -> ${nodeId(edge.taskId)};`);
    }

    lines.push('}');
    return lines.join('\n');
  }

  /**
   * Maps each task id to a distinct node id. Ids that sanitize to a node id
   * already taken get a numeric suffix, in plan order.
   */
  private assignNodeIds(tasks: readonly Task[]): Map<string, string> {
    const nodeIds = new Map<string, string>();
    const used = new Set<string>();

    for (const task of tasks) {
      const base = this.sanitizeNodeId(task.id);
      let candidate = base;
      for (let n = 2; used.has(candidate); n++) {
        candidate = `${base}_${n}`;
      }
      used.add(candidate);
      nodeIds.set(task.id, candidate);
    }

    return nodeIds;
  }

  /**
   * Sanitizes a task ID for use in graph syntax
   */
  private sanitizeNodeId(id: string): string {
    return id.replace(/[^A-Za-z0-9_]/g, '_');
  }

  /**
   * Escapes text for Mermaid syntax
   */
  private escapeMermaidText(text: string): string {
    return text
      .replace(/"/g, "'")
      .replace(/\[/g, '(')
      .replace(/\]/g, ')')
      .replace(/\n/g, ' ');
  }

  /**
   * Escapes text for DOT syntax
   */
  private escapeDotText(text: string): string {
    return text
      .replace(/"/g, '\\"')
      .replace(/\n/g, '\\n');
  }
}
