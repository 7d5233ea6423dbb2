// Commands that inspect stored plans: list, order, ready

import { Command } from 'commander';
import type { Task } from '../../models/task.js';
import { comparePriority } from '../../models/types.js';
import { createContext, requirePlan } from '../utils/context.js';
import { info, withErrorHandling } from '../utils/error-handler.js';

function formatTask(task: Task): string {
  return `${task.id} [${task.priority}] ${task.title}`;
}

export function registerPlanCommands(program: Command): void {
  program
    .command('list')
    .description('List stored plans')
    .action(withErrorHandling(async () => {
      const { store } = await createContext(program);
      const names = await store.list();

      if (names.length === 0) {
        info('No plans stored');
        return;
      }
      for (const name of names) {
        console.log(name);
      }
    }));

  program
    .command('order <name>')
    .description('Print tasks in dependency order')
    .action(withErrorHandling(async (name: string) => {
      const { store } = await createContext(program);
      const plan = await requirePlan(store, name);

      plan.topologicalOrder().forEach((task, index) => {
        console.log(`${index + 1}. ${formatTask(task)} (${task.status})`);
      });
    }));

  program
    .command('ready <name>')
    .description('Print tasks that can start now, highest priority first')
    .action(withErrorHandling(async (name: string) => {
      const { store } = await createContext(program);
      const plan = await requirePlan(store, name);

      // sort is stable, so equal priorities keep plan order
      const ready = plan.readyTasks().sort((a, b) => comparePriority(a.priority, b.priority));
      if (ready.length === 0) {
        info('No tasks ready');
        return;
      }
      for (const task of ready) {
        console.log(formatTask(task));
      }
    }));
}
