/**
 * Progress Formatter
 *
 * Renders a plan's progress summary for the terminal, as a markdown
 * table, or as JSON.
 */

import type { ProgressSummary } from '../planning/readiness.js';

export type ProgressFormat = 'terminal' | 'markdown' | 'json';

export const PROGRESS_FORMATS: readonly ProgressFormat[] = ['terminal', 'markdown', 'json'];

export interface ProgressOutputOptions {
  title: string;
  /** Number of cells in the terminal progress bar */
  barWidth?: number;
}

export const DEFAULT_BAR_WIDTH = 20;

export function isProgressFormat(value: string): value is ProgressFormat {
  return PROGRESS_FORMATS.some(format => format === value);
}

export function formatProgress(
  summary: ProgressSummary,
  format: ProgressFormat,
  options: ProgressOutputOptions
): string {
  switch (format) {
    case 'terminal':
      return formatTerminalProgress(summary, options);
    case 'markdown':
      return formatMarkdownProgress(summary, options);
    case 'json':
      return JSON.stringify({ title: options.title, ...summary }, null, 2);
  }
}

/**
 * Progress bar of filled and empty cells followed by the percentage, e.g. `[█████░░░░░] 50.0%`
 */
export function progressBar(percentage: number, width: number = DEFAULT_BAR_WIDTH): string {
  const clamped = Math.min(100, Math.max(0, percentage));
  const filled = Math.floor((clamped / 100) * width);
  return `[${'█'.repeat(filled)}${'░'.repeat(width - filled)}] ${clamped.toFixed(1)}%`;
}

export function formatHours(hours: number): string {
  return `${Math.round(hours * 10) / 10}h`;
}

function formatTerminalProgress(summary: ProgressSummary, options: ProgressOutputOptions): string {
  const { byStatus } = summary;
  const lines: string[] = [
    options.title,
    progressBar(summary.completionPercentage, options.barWidth ?? DEFAULT_BAR_WIDTH),
    '',
    `Done: ${byStatus.done} | In Progress: ${byStatus.in_progress} | Todo: ${byStatus.todo} | Blocked: ${byStatus.blocked}`,
    `Ready: ${summary.ready} | Overdue: ${summary.overdue} | Remaining: ${summary.remaining}/${summary.total}`,
    `Estimate: ${formatHours(summary.remainingEstimateHours)} remaining of ${formatHours(summary.totalEstimateHours)}`
  ];

  if (summary.isComplete) {
    lines.push('', '✓ All tasks done');
  }

  return lines.join('\n');
}

function formatMarkdownProgress(summary: ProgressSummary, options: ProgressOutputOptions): string {
  const { byStatus } = summary;
  const rows: Array<[string, string]> = [
    ['Total', String(summary.total)],
    ['Done', String(byStatus.done)],
    ['In Progress', String(byStatus.in_progress)],
    ['Todo', String(byStatus.todo)],
    ['Blocked', String(byStatus.blocked)],
    ['Ready', String(summary.ready)],
    ['Overdue', String(summary.overdue)],
    ['Completion', `${summary.completionPercentage.toFixed(1)}%`],
    ['Estimate (remaining / total)', `${formatHours(summary.remainingEstimateHours)} / ${formatHours(summary.totalEstimateHours)}`]
  ];

  return [
    `# ${options.title}`,
    '',
    '| Metric | Value |',
    '|--------|-------|',
    ...rows.map(([metric, value]) => `| ${metric} | ${value} |`),
    ''
  ].join('\n');
}
