// Storage service exports

export { PlanStore, type PlanStoreConfig } from './plan-store.js';
