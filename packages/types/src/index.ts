// Node tree model
export * from './nodes/index.js';

// Zod tuning schemas
export * from './schemas/index.js';

// Errors and logging collaborator
export { LayoutAssertionError, ConversionError } from './errors.js';
export type { ConversionFailure } from './errors.js';
export { consoleLogger, createConsoleLogger, silentLogger } from './logger.js';
export type { ConsoleLoggerOptions, Logger } from './logger.js';

// Scalar converters and constants
export * from './utils/index.js';
