export { createLogger, createChildLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { redactValue, redactText, REDACT_PATHS } from "./pii-redactor.js";
