// Validate and import commands for plan JSON files

import { Command } from 'commander';
import { createContext, readPlanFile } from '../utils/context.js';
import { success, withErrorHandling } from '../utils/error-handler.js';
import { logger } from '../../core/logger.js';

export function registerValidateCommands(program: Command): void {
  program
    .command('validate <file>')
    .description('Check that a plan JSON file is a valid, acyclic plan')
    .action(withErrorHandling(async (file: string) => {
      await createContext(program);
      const plan = await readPlanFile(file);
      success(`${plan.title} is valid: ${plan.tasks.length} tasks, ${plan.dependencies.length} dependencies`);
    }));

  program
    .command('import <file> <name>')
    .description('Validate a plan JSON file and save it to the store')
    .action(withErrorHandling(async (file: string, name: string) => {
      const { store } = await createContext(program);
      const plan = await readPlanFile(file);
      await store.save(name, plan);
      logger.info('Imported plan', { file, name });
      success(`Imported ${plan.title} as ${name}`);
    }));
}
