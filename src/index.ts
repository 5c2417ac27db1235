/**
 * Main export file for library consumption
 */

export * from './domain/types';
export * from './domain/labels';
export * from './deployment/deployment-unit';
export * from './errors';
export * from './config';
export * from './infrastructure';
export { createLogger, createTimer, type Logger, type LoggerConfig, type Timer } from './lib/logger';
