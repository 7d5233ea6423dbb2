// Command tree for the task planner CLI

import { Command } from 'commander';
import { registerInitCommand } from './commands/init.js';
import { registerValidateCommands } from './commands/validate.js';
import { registerPlanCommands } from './commands/plan.js';
import { registerProgressCommand } from './commands/progress.js';
import { registerTransitionCommand } from './commands/transition.js';
import { registerAddTaskCommand } from './commands/add-task.js';
import { registerGraphCommand } from './commands/graph.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('planner')
    .description('Task Planner - dependency-ordered plans with task status tracking')
    .version('0.1.0')
    .option('-d, --base-dir <dir>', 'Plan store directory', '.planner')
    .option('-v, --verbose', 'Enable debug logging');

  registerInitCommand(program);
  registerValidateCommands(program);
  registerPlanCommands(program);
  registerProgressCommand(program);
  registerTransitionCommand(program);
  registerAddTaskCommand(program);
  registerGraphCommand(program);

  return program;
}
