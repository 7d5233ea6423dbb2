// Progress command - completion report for a stored plan

import { Command } from 'commander';
import { PROGRESS_FORMATS, formatProgress, isProgressFormat } from '../../services/progress/progress-formatter.js';
import { ValidationError } from '../../core/errors.js';
import { createContext, requirePlan } from '../utils/context.js';
import { withErrorHandling } from '../utils/error-handler.js';

export function registerProgressCommand(program: Command): void {
  program
    .command('progress <name>')
    .description('Show completion, readiness and estimates for a plan')
    .option('-f, --format <format>', `Output format (${PROGRESS_FORMATS.join(', ')})`, 'terminal')
    .action(withErrorHandling(async (name: string, options: { format: string }) => {
      if (!isProgressFormat(options.format)) {
        throw new ValidationError('format', `invalid format "${options.format}". Allowed: ${PROGRESS_FORMATS.join(', ')}`);
      }

      const { store, config } = await createContext(program);
      const plan = await requirePlan(store, name);
      const barWidth = await config.getBarWidth();

      console.log(formatProgress(plan.progress(), options.format, { title: plan.title, barWidth }));
    }));
}
