// Export all services

export * from './planning/index.js';
export * from './progress/index.js';
export * from './graph/index.js';
export * from './storage/index.js';
export * from './config/index.js';
