// Transition command - move a task to a new status and save the plan

import { Command } from 'commander';
import { parseTaskStatus } from '../../core/validation.js';
import { logger } from '../../core/logger.js';
import { createContext, requirePlan } from '../utils/context.js';
import { success, withErrorHandling } from '../utils/error-handler.js';

export function registerTransitionCommand(program: Command): void {
  program
    .command('transition <name> <taskId> <status>')
    .description('Change the status of a task (todo, in_progress, done, blocked)')
    .action(withErrorHandling(async (name: string, taskId: string, status: string) => {
      const to = parseTaskStatus(status);
      const { store } = await createContext(program);
      const plan = await requirePlan(store, name);

      const from = plan.getTask(taskId)?.status;
      const task = plan.transitionTask(taskId, to);
      await store.save(name, plan);

      logger.debug('Transitioned task', { name, taskId, from, to });
      success(`${task.id} is now ${task.status}`);
    }));
}
