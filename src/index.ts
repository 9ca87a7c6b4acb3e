/**
 * Main entry point for the broker library.
 * All public APIs are exported from this file.
 */

export { Broker, resolveOperation, createResponse } from './broker';
export { Channel } from './channel';
export { ChannelRegistry } from './internal';
export { validateRequest } from './request-schema';
export { loadBrokerOptionsFromEnv } from './config';
export { uuidIdGenerator, sequentialIdGenerator } from './utils/id-generator';
export { ConsoleLogger, LogLevel, parseLogLevel, logger } from './utils/logger';
export type { Logger } from './utils/logger';
export * from './types';
