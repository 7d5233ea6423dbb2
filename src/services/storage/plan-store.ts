// File store for plan persistence

import * as fs from 'fs/promises';
import * as path from 'path';
import { Plan } from '../planning/plan.js';
import { StorageError } from '../../core/errors.js';
import { validatePlanName } from '../../core/validation.js';
import { logger } from '../../core/logger.js';

/**
 * Configuration for the plan store
 */
export interface PlanStoreConfig {
  /** Base directory for plan storage (default: .planner) */
  baseDir: string;
}

const DEFAULT_CONFIG: PlanStoreConfig = {
  baseDir: '.planner'
};

const PLANS_DIR = 'plans';
const PLAN_EXTENSION = '.json';

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

function isNotFound(error: unknown): boolean {
  return hasCode(error, 'ENOENT');
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Stores plans as JSON files under `<baseDir>/plans/<name>.json`.
 * Every load goes through Plan.fromJSON, so stored data is re-validated.
 */
export class PlanStore {
  private config: PlanStoreConfig;

  constructor(config: Partial<PlanStoreConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get baseDir(): string {
    return this.config.baseDir;
  }

  /**
   * Creates the directory structure and an empty config file
   */
  async initialize(): Promise<void> {
    try {
      await fs.mkdir(path.join(this.config.baseDir, PLANS_DIR), { recursive: true });
    } catch (error) {
      throw new StorageError(`Cannot create plan directory: ${errorMessage(error)}`, { baseDir: this.config.baseDir });
    }

    const configPath = path.join(this.config.baseDir, 'config.yaml');
    try {
      // 'wx' leaves an existing config file alone
      await fs.writeFile(configPath, '# Task Planner Configuration\n', { encoding: 'utf-8', flag: 'wx' });
      logger.debug('Created config file', { configPath });
    } catch (error) {
      if (!hasCode(error, 'EEXIST')) {
        throw new StorageError(`Cannot create config file: ${errorMessage(error)}`, { configPath });
      }
    }
  }

  /**
   * Writes a plan, replacing any plan stored under the same name
   *
   * @throws ValidationError or SecurityError if the name is not usable as a file name
   */
  async save(name: string, plan: Plan): Promise<void> {
    const filePath = this.getPlanPath(name);

    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, `${plan.serialize()}\n`, 'utf-8');
    } catch (error) {
      throw new StorageError(`Cannot save plan ${name}: ${errorMessage(error)}`, { name });
    }

    logger.debug('Saved plan', { name, tasks: plan.tasks.length });
  }

  /**
   * Loads and re-validates a plan
   *
   * @returns The plan, or null if none is stored under this name
   */
  async load(name: string): Promise<Plan | null> {
    const filePath = this.getPlanPath(name);

    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw new StorageError(`Cannot read plan ${name}: ${errorMessage(error)}`, { name });
    }

    const plan = Plan.fromJSON(content);
    logger.debug('Loaded plan', { name, tasks: plan.tasks.length });
    return plan;
  }

  /**
   * @returns true if deleted, false if not found
   */
  async delete(name: string): Promise<boolean> {
    const filePath = this.getPlanPath(name);

    try {
      await fs.unlink(filePath);
      logger.debug('Deleted plan', { name });
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw new StorageError(`Cannot delete plan ${name}: ${errorMessage(error)}`, { name });
    }
  }

  /**
   * Lists stored plan names, sorted
   */
  async list(): Promise<string[]> {
    const dirPath = path.join(this.config.baseDir, PLANS_DIR);

    let files: string[];
    try {
      files = await fs.readdir(dirPath);
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw new StorageError(`Cannot list plans: ${errorMessage(error)}`, { dirPath });
    }

    return files
      .filter(file => file.endsWith(PLAN_EXTENSION))
      .map(file => file.slice(0, -PLAN_EXTENSION.length))
      .sort();
  }

  private getPlanPath(name: string): string {
    const safeName = validatePlanName(name);
    return path.join(this.config.baseDir, PLANS_DIR, `${safeName}${PLAN_EXTENSION}`);
  }
}
