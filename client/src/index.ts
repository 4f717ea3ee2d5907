// Client
export * from './api/index.js';

// Core
export * from './http/index.js';
export * from './pagination/index.js';

// Logging
export * from './logging/index.js';

// Configuration
export { loadConfig, loadEnv, type LoadEnvOptions } from './config.js';

// Utils
export { formatDate, defaultDateWindow, withDateDefaults, DEFAULT_WINDOW_DAYS } from './utils/dates.js';
export { formatElapsed } from './utils/elapsed.js';
