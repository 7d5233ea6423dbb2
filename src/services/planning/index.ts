/**
 * Planning Module
 *
 * Plan dependency graph and task state machine.
 *
 * @module services/planning
 */

export { Plan, type CreatePlanData, type PlanResult } from './plan.js';
export { createTask, createDependency, DEFAULT_PRIORITY, type CreateTaskData } from './task-factory.js';
export { validTransitions, canTransition, isTerminal, transition } from './status-machine.js';
export { detectCycle } from './cycle-detector.js';
export { topologicalOrder } from './topological-sort.js';
export {
  readyTasks,
  blockedTasks,
  overdueTasks,
  isOverdue,
  completionPercentage,
  totalEstimate,
  progressSummary,
  type ProgressSummary
} from './readiness.js';
