// Main entry point for the instance allocator
export * from './types';
export * from './config';
export * from './provisioning';
export * from './orchestration';
export { ConsoleLogger, silentLogger } from './utils/logger';
export type { ConsoleLoggerOptions, Logger } from './utils/logger';

export { createAllocator } from './allocator';
export type { AllocatorOptions } from './allocator';
