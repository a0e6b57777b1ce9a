export * from './core/filters/index.js';
export { UpdateRouter } from './core/router/UpdateRouter.js';
export type { UpdateHandler, UpdateRouterOptions, DispatchResult } from './core/router/UpdateRouter.js';
export { loadConfig } from './config/index.js';
export type { Config } from './config/index.js';
export { createLogger } from './utils/logger.js';
export { UpdateFiltersError, FilterError, RouterError, ConfigError } from './utils/errors.js';
