// Configuration service exports

export { ConfigService, type TaskDefaults } from './config-service.js';
