/**
 * Progress Module
 *
 * @module services/progress
 */

export {
  formatProgress,
  formatHours,
  progressBar,
  isProgressFormat,
  PROGRESS_FORMATS,
  DEFAULT_BAR_WIDTH,
  type ProgressFormat,
  type ProgressOutputOptions
} from './progress-formatter.js';
