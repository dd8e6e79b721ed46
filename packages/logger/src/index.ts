/**
 * @wikindex/logger
 *
 * Structured logging with secret redaction for the indexing pipeline.
 */

export { createLogger, createChildLogger, createSilentLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { redactValue, redactObject, redactUrl, REDACT_PATHS } from "./secret-redactor.js";
