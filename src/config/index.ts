export * from './defaults';
export { loadConfig, getConfig, resetConfig, RuntimeConfigSchema, LOG_LEVELS } from './loader';
export type { RuntimeConfig, LogLevel } from './loader';
