/**
 * Observability for the telemetry pipeline itself
 */

export type { LogLevel, Logger, ConsoleLoggerOptions } from './logging.js';
export { ConsoleLogger, NoopLogger, noopLogger } from './logging.js';
