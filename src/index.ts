export * from './engine';
export { config, loadConfig, ConfigValidationError } from './config';
export type { AppConfig } from './config';
export { logger } from './utils/logger';
