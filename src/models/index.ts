// Export all domain models

export * from './types.js';
export * from './task.js';
export * from './plan.js';
