// Init command for the task planner CLI

import { Command } from 'commander';
import { createContext } from '../utils/context.js';
import { success, withErrorHandling } from '../utils/error-handler.js';

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Initialize the plan store directory structure')
    .action(withErrorHandling(async () => {
      const { store } = await createContext(program);
      await store.initialize();
      success(`Initialized ${store.baseDir}`);
      console.log('  Created:');
      console.log(`    - ${store.baseDir}/plans/`);
      console.log(`    - ${store.baseDir}/config.yaml`);
    }));
}
