// Graph command - dependency graph of a stored plan

import { Command } from 'commander';
import * as fs from 'fs/promises';
import { GRAPH_FORMATS, GraphService, isGraphFormat } from '../../services/graph/graph-service.js';
import { NotFoundError, ValidationError } from '../../core/errors.js';
import { createContext, requirePlan } from '../utils/context.js';
import { success, withErrorHandling } from '../utils/error-handler.js';

interface GraphCommandOptions {
  format?: string;
  root?: string;
  ready?: boolean;
  output?: string;
}

export function registerGraphCommand(program: Command): void {
  program
    .command('graph <name>')
    .description('Generate a dependency graph visualization of a plan')
    .option('-f, --format <format>', `Output format (${GRAPH_FORMATS.join(', ')}); defaults to graph.format from config`)
    .option('-r, --root <task-id>', 'Show only tasks connected to the specified task')
    .option('--ready', 'Highlight tasks that are ready to start')
    .option('-o, --output <file>', 'Write output to file instead of stdout')
    .action(withErrorHandling(async (name: string, options: GraphCommandOptions) => {
      const { store, config } = await createContext(program);
      const format = options.format ?? await config.getGraphFormat();

      if (!isGraphFormat(format)) {
        throw new ValidationError('format', `invalid format "${format}". Allowed: ${GRAPH_FORMATS.join(', ')}`);
      }

      const plan = await requirePlan(store, name);
      if (options.root && !plan.getTask(options.root)) {
        throw new NotFoundError('Task', options.root);
      }

      const graphService = new GraphService();
      const graphOutput = graphService.generateGraph(plan, {
        format,
        rootId: options.root,
        highlightReady: options.ready
      });

      if (options.output) {
        await fs.writeFile(options.output, `${graphOutput}\n`, 'utf-8');
        success(`Graph written to ${options.output}`);
        console.log(`  Format: ${format}`);
        if (options.root) {
          console.log(`  Root: ${options.root}`);
        }
      } else {
        console.log(graphOutput);
      }
    }));
}
