// Add-task command - append a task to a stored plan using config defaults

import { Command } from 'commander';
import { parsePriority } from '../../core/validation.js';
import { logger } from '../../core/logger.js';
import { createContext, requirePlan } from '../utils/context.js';
import { success, withErrorHandling } from '../utils/error-handler.js';

interface AddTaskOptions {
  description?: string;
  priority?: string;
  tag: string[];
  dependsOn: string[];
  due?: string;
  estimate?: string;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function registerAddTaskCommand(program: Command): void {
  program
    .command('add-task <name> <taskId> <title>')
    .description('Add a task to a plan; priority and tags default to the defaults section of config')
    .option('--description <text>', 'Task description')
    .option('-p, --priority <priority>', 'Priority (P0-P3)')
    .option('-t, --tag <tag>', 'Tag, repeatable; adds to the configured default tags', collect, [])
    .option('--depends-on <taskId>', 'Prerequisite task, repeatable', collect, [])
    .option('--due <date>', 'Due date (ISO 8601)')
    .option('--estimate <hours>', 'Estimate in hours')
    .action(withErrorHandling(async (name: string, taskId: string, title: string, options: AddTaskOptions) => {
      const { store, config } = await createContext(program);
      const defaults = await config.getTaskDefaults();
      const plan = await requirePlan(store, name);
      const priority = options.priority !== undefined ? parsePriority(options.priority) : defaults.priority;

      const updated = plan.withTask({
        id: taskId,
        title,
        description: options.description,
        priority,
        tags: [...new Set([...defaults.tags, ...options.tag])],
        dueDate: options.due,
        estimateHours: options.estimate !== undefined ? Number(options.estimate) : undefined
      }, options.dependsOn);
      await store.save(name, updated);

      logger.debug('Added task', { name, taskId, dependsOn: options.dependsOn });
      success(`Added ${taskId} [${priority}] to ${name}`);
    }));
}
