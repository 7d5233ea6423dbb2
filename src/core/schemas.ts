// Zod schemas for plan files and configuration

import { z } from 'zod';

/**
 * Task status enum
 */
export const TaskStatusSchema = z.enum(['todo', 'in_progress', 'done', 'blocked']);

/**
 * Priority enum
 */
export const PrioritySchema = z.enum(['P0', 'P1', 'P2', 'P3']);

/**
 * Task record schema.
 * Title and estimate rules are enforced by task construction, not here,
 * so deserialized data reports the same errors as fresh input.
 */
export const TaskRecordSchema = z.object({
  id: z.string().min(1, 'Task ID is required'),
  title: z.string(),
  description: z.string().default(''),
  status: TaskStatusSchema,
  priority: PrioritySchema,
  due_date: z.string().nullish(),
  estimate_hours: z.number().nullish(),
  tags: z.array(z.string()).default([])
});

/**
 * Dependency record schema
 */
export const DependencyRecordSchema = z.object({
  task_id: z.string().min(1),
  depends_on: z.string().min(1)
});

/**
 * Plan file schema
 */
export const PlanRecordSchema = z.object({
  title: z.string(),
  description: z.string().default(''),
  tasks: z.array(TaskRecordSchema),
  dependencies: z.array(DependencyRecordSchema).default([])
});

export const GraphFormatSchema = z.enum(['mermaid', 'dot']);

export const LogLevelNameSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/**
 * Configuration file schema (.planner/config.yaml)
 */
export const PlannerConfigSchema = z.object({
  defaults: z.object({
    priority: PrioritySchema.optional(),
    tags: z.array(z.string()).optional()
  }).optional(),
  graph: z.object({
    format: GraphFormatSchema.optional()
  }).optional(),
  progress: z.object({
    barWidth: z.number().int().min(5).max(80).optional()
  }).optional(),
  logging: z.object({
    level: LogLevelNameSchema.optional()
  }).optional()
});

/**
 * Type exports
 */
export type ParsedTaskRecord = z.infer<typeof TaskRecordSchema>;
export type ParsedPlanRecord = z.infer<typeof PlanRecordSchema>;
export type PlannerConfig = z.infer<typeof PlannerConfigSchema>;

/**
 * Safe validation (returns result instead of throwing)
 */
export function safeParsePlanRecord(data: unknown) {
  return PlanRecordSchema.safeParse(data);
}

export function safeParseConfig(data: unknown) {
  return PlannerConfigSchema.safeParse(data);
}
