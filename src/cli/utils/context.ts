// Shared services for CLI commands, built from the global options

import * as fs from 'fs/promises';
import { Command } from 'commander';
import { PlanStore } from '../../services/storage/plan-store.js';
import { ConfigService } from '../../services/config/config-service.js';
import { Plan } from '../../services/planning/plan.js';
import { NotFoundError } from '../../core/errors.js';
import { LogLevel, Logger, toLogLevel } from '../../core/logger.js';

export interface GlobalOptions {
  baseDir: string;
  verbose?: boolean;
}

export interface CliContext {
  store: PlanStore;
  config: ConfigService;
}

/**
 * Builds the store and config service for the base directory and applies
 * the log level (`--verbose` wins over `logging.level`)
 */
export async function createContext(program: Command): Promise<CliContext> {
  const options = program.opts<GlobalOptions>();
  const store = new PlanStore({ baseDir: options.baseDir });
  const config = new ConfigService({ baseDir: options.baseDir });

  const level = options.verbose ? LogLevel.DEBUG : toLogLevel(await config.getLogLevel());
  Logger.configure({ level });

  return { store, config };
}

/**
 * @throws NotFoundError if no plan is stored under this name
 */
export async function requirePlan(store: PlanStore, name: string): Promise<Plan> {
  const plan = await store.load(name);
  if (!plan) {
    throw new NotFoundError('Plan', name);
  }
  return plan;
}

/**
 * Reads and validates a plan JSON file
 *
 * @throws NotFoundError if the file does not exist
 */
export async function readPlanFile(file: string): Promise<Plan> {
  let content: string;
  try {
    content = await fs.readFile(file, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new NotFoundError('File', file);
    }
    throw error;
  }
  return Plan.fromJSON(content);
}
