/**
 * Configuration Service
 *
 * Loads and provides access to configuration defaults from .planner/config.yaml.
 * Covers task defaults, graph output, progress rendering and log level.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import type { Priority } from '../../models/types.js';
import type { GraphFormat } from '../graph/graph-service.js';
import type { LogLevelName } from '../../core/logger.js';
import { type PlannerConfig, safeParseConfig } from '../../core/schemas.js';
import { ValidationError } from '../../core/errors.js';
import { DEFAULT_BAR_WIDTH } from '../progress/progress-formatter.js';

/**
 * Default values applied to newly created tasks
 */
export interface TaskDefaults {
  priority: Priority;
  tags: string[];
}

const DEFAULT_TASK_DEFAULTS: TaskDefaults = {
  priority: 'P2',
  tags: []
};

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Configuration Service
 *
 * Provides access to configuration values from .planner/config.yaml
 * with defaults when configuration is not present.
 */
export class ConfigService {
  private baseDir: string;
  private configPath: string;
  private cachedConfig: PlannerConfig | null = null;

  constructor(options: { baseDir?: string } = {}) {
    this.baseDir = options.baseDir || '.planner';
    this.configPath = path.join(this.baseDir, 'config.yaml');
  }

  /**
   * Load configuration from file, with caching
   *
   * @throws ValidationError (field `config`) if the file is not valid YAML or does not match the schema
   */
  async loadConfig(): Promise<PlannerConfig> {
    if (this.cachedConfig !== null) {
      return this.cachedConfig;
    }

    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        this.cachedConfig = {};
        return this.cachedConfig;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = yaml.parse(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ValidationError('config', `invalid YAML in ${this.configPath}: ${message}`);
    }

    // A file holding only comments parses to null
    const result = safeParseConfig(parsed ?? {});
    if (!result.success) {
      const reason = result.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ValidationError('config', reason);
    }

    this.cachedConfig = result.data;
    return result.data;
  }

  /**
   * Clear the cached configuration (useful for testing or after config changes)
   */
  clearCache(): void {
    this.cachedConfig = null;
  }

  async getTaskDefaults(): Promise<TaskDefaults> {
    const config = await this.loadConfig();
    return {
      priority: config.defaults?.priority ?? DEFAULT_TASK_DEFAULTS.priority,
      tags: config.defaults?.tags ?? [...DEFAULT_TASK_DEFAULTS.tags]
    };
  }

  async getGraphFormat(): Promise<GraphFormat> {
    const config = await this.loadConfig();
    return config.graph?.format ?? 'mermaid';
  }

  async getBarWidth(): Promise<number> {
    const config = await this.loadConfig();
    return config.progress?.barWidth ?? DEFAULT_BAR_WIDTH;
  }

  async getLogLevel(): Promise<LogLevelName> {
    const config = await this.loadConfig();
    return config.logging?.level ?? 'info';
  }

  /**
   * Save configuration to file
   */
  async saveConfig(config: PlannerConfig): Promise<void> {
    const content = yaml.stringify(config);
    await fs.mkdir(this.baseDir, { recursive: true });
    await fs.writeFile(this.configPath, content, 'utf-8');
    this.cachedConfig = config;
  }

  /**
   * Update specific configuration sections
   */
  async updateConfig(updates: Partial<PlannerConfig>): Promise<void> {
    const currentConfig = await this.loadConfig();
    const newConfig = { ...currentConfig, ...updates };
    await this.saveConfig(newConfig);
  }
}
