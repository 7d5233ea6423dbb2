/**
 * Plan
 *
 * Aggregate root owning tasks and dependency edges. Every invariant is
 * checked when a plan is created or deserialized, so an existing Plan is
 * always valid. The only mutation is a status transition of one task.
 */

import type { Task, TaskDependency, TaskGraph } from '../../models/task.js';
import type { TaskStatus } from '../../models/types.js';
import type { PlanRecord, TaskRecord } from '../../models/plan.js';
import {
  CyclicDependencyError,
  DuplicateIdError,
  MissingDependencyError,
  NotFoundError,
  PlanningError,
  SelfDependencyError,
  SerializationError,
  ValidationError,
  isPlanningError
} from '../../core/errors.js';
import { validateTitle } from '../../core/validation.js';
import { type ParsedTaskRecord, PlanRecordSchema } from '../../core/schemas.js';
import { type CreateTaskData, createTask } from './task-factory.js';
import { detectCycle } from './cycle-detector.js';
import { topologicalOrder } from './topological-sort.js';
import { transition } from './status-machine.js';
import {
  ProgressSummary,
  blockedTasks,
  completionPercentage,
  overdueTasks,
  progressSummary,
  readyTasks,
  totalEstimate
} from './readiness.js';

/**
 * Data for creating a plan
 */
export interface CreatePlanData {
  title: string;
  description?: string;
  tasks: readonly Task[];
  dependencies?: readonly TaskDependency[];
}

/**
 * Outcome of Plan.safeCreate
 */
export type PlanResult =
  | { success: true; plan: Plan }
  | { success: false; error: PlanningError };

export class Plan implements TaskGraph {
  private readonly taskList: Task[];
  private readonly edgeList: TaskDependency[];
  private readonly indexById: Map<string, number>;

  private constructor(
    readonly title: string,
    readonly description: string,
    tasks: Task[],
    dependencies: TaskDependency[],
    indexById: Map<string, number>
  ) {
    this.taskList = tasks;
    this.edgeList = dependencies;
    this.indexById = indexById;
  }

  /**
   * Creates a validated plan. Checks run in order and the first failure is thrown:
   * plan title, task fields and duplicate ids (task by task), edges, cycles.
   * Tasks go through createTask again, so hand-built tasks meet the same rules.
   *
   * @throws ValidationError if the plan title, or a task's id, title or estimate, is invalid
   * @throws DuplicateIdError if two tasks share an id
   * @throws SelfDependencyError if an edge points a task at itself
   * @throws MissingDependencyError if an edge references an unknown task
   * @throws CyclicDependencyError if the edges form a cycle
   */
  static create(data: CreatePlanData): Plan {
    const title = validateTitle(data.title);
    const dependencies = [...(data.dependencies ?? [])];

    const indexById = new Map<string, number>();
    const tasks = data.tasks.map((input, index) => {
      const task = createTask(input);
      if (indexById.has(task.id)) {
        throw new DuplicateIdError(task.id);
      }
      indexById.set(task.id, index);
      return task;
    });

    for (const dep of dependencies) {
      if (dep.taskId === dep.dependsOn) {
        throw new SelfDependencyError(dep.taskId);
      }
      if (!indexById.has(dep.taskId) || !indexById.has(dep.dependsOn)) {
        throw new MissingDependencyError(dep.taskId, dep.dependsOn);
      }
    }

    const cycle = detectCycle(tasks.map(t => t.id), dependencies);
    if (cycle) {
      throw new CyclicDependencyError(cycle);
    }

    return new Plan(title, data.description ?? '', tasks, dependencies, indexById);
  }

  /**
   * Same checks as create, returning the planning error instead of throwing it
   */
  static safeCreate(data: CreatePlanData): PlanResult {
    try {
      return { success: true, plan: Plan.create(data) };
    } catch (error) {
      if (isPlanningError(error)) {
        return { success: false, error };
      }
      throw error;
    }
  }

  /**
   * Rebuilds a plan from its persisted shape. Past the shape check, records go
   * straight to create, so errors come out in the same order.
   *
   * @throws ValidationError (field `deserialization`) if the data does not have the plan shape
   */
  static fromSerialized(data: unknown): Plan {
    const parsed = PlanRecordSchema.safeParse(data);
    if (!parsed.success) {
      const reason = parsed.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ValidationError('deserialization', reason);
    }

    const record = parsed.data;
    return Plan.create({
      title: record.title,
      description: record.description,
      tasks: record.tasks.map(fromTaskRecord),
      dependencies: record.dependencies.map(dep => ({ taskId: dep.task_id, dependsOn: dep.depends_on }))
    });
  }

  /**
   * @throws SerializationError if the text is not valid JSON
   */
  static fromJSON(json: string): Plan {
    let data: unknown;
    try {
      data = JSON.parse(json);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new SerializationError(`Invalid plan JSON: ${message}`);
    }
    return Plan.fromSerialized(data);
  }

  get tasks(): readonly Task[] {
    return this.taskList;
  }

  get dependencies(): readonly TaskDependency[] {
    return this.edgeList;
  }

  getTask(taskId: string): Task | undefined {
    const index = this.indexById.get(taskId);
    return index === undefined ? undefined : this.taskList[index];
  }

  /**
   * Tasks that `taskId` depends on, in edge order
   */
  prerequisitesOf(taskId: string): Task[] {
    return this.edgeList
      .filter(dep => dep.taskId === taskId)
      .map(dep => this.requireTask(dep.dependsOn));
  }

  /**
   * Tasks that depend on `taskId`, in edge order
   */
  dependentsOf(taskId: string): Task[] {
    return this.edgeList
      .filter(dep => dep.dependsOn === taskId)
      .map(dep => this.requireTask(dep.taskId));
  }

  topologicalOrder(): Task[] {
    return topologicalOrder(this.taskList, this.edgeList);
  }

  readyTasks(): Task[] {
    return readyTasks(this);
  }

  blockedTasks(): Task[] {
    return blockedTasks(this);
  }

  overdueTasks(now: Date = new Date()): Task[] {
    return overdueTasks(this, now);
  }

  completionPercentage(): number {
    return completionPercentage(this);
  }

  totalEstimate(): number {
    return totalEstimate(this.taskList);
  }

  progress(now: Date = new Date()): ProgressSummary {
    return progressSummary(this, now);
  }

  /**
   * Moves one task to a new status. On failure the plan is unchanged.
   *
   * @returns The updated task
   * @throws NotFoundError if no task has this id
   * @throws InvalidTransitionError if the transition is not allowed
   */
  transitionTask(taskId: string, to: TaskStatus): Task {
    const index = this.indexById.get(taskId);
    if (index === undefined) {
      throw new NotFoundError('Task', taskId);
    }

    const updated = transition(this.taskList[index], to);
    this.taskList[index] = updated;
    return updated;
  }

  /**
   * New plan with one more task, depending on the given tasks. Runs every
   * check of create, so this plan is left as it was on failure.
   *
   * @throws DuplicateIdError if the id is taken
   * @throws MissingDependencyError if a prerequisite is not in the plan
   */
  withTask(data: CreateTaskData, dependsOn: readonly string[] = []): Plan {
    return Plan.create({
      title: this.title,
      description: this.description,
      tasks: [...this.taskList, createTask(data)],
      dependencies: [...this.edgeList, ...dependsOn.map(id => ({ taskId: data.id, dependsOn: id }))]
    });
  }

  /**
   * Persisted shape of the plan
   */
  toJSON(): PlanRecord {
    return {
      title: this.title,
      description: this.description,
      tasks: this.taskList.map(toTaskRecord),
      dependencies: this.edgeList.map(dep => ({ task_id: dep.taskId, depends_on: dep.dependsOn }))
    };
  }

  serialize(): string {
    return JSON.stringify(this.toJSON(), null, 2);
  }

  private requireTask(taskId: string): Task {
    const task = this.getTask(taskId);
    if (!task) {
      throw new NotFoundError('Task', taskId);
    }
    return task;
  }
}

function fromTaskRecord(record: ParsedTaskRecord): Task {
  return {
    id: record.id,
    title: record.title,
    description: record.description,
    status: record.status,
    priority: record.priority,
    dueDate: record.due_date ?? undefined,
    estimateHours: record.estimate_hours ?? undefined,
    tags: record.tags
  };
}

function toTaskRecord(task: Task): TaskRecord {
  const record: TaskRecord = {
    id: task.id,
    title: task.title,
    description: task.description,
    status: task.status,
    priority: task.priority,
    tags: [...task.tags]
  };
  if (task.dueDate !== undefined) {
    record.due_date = task.dueDate;
  }
  if (task.estimateHours !== undefined) {
    record.estimate_hours = task.estimateHours;
  }
  return record;
}
