export { createNullLogger, NullLogger } from "./adapters/null/null-logger"
export { createPinoLogger, PinoLogger, type PinoLoggerDeps } from "./adapters/pino/pino-logger"
export type { LogContext, LogContextPatch, LogEvent, LogMeta } from "./ports/log-context"
export type { Logger } from "./ports/logger"
export { type LoggerOptions, type LogLevelName, logLevelNames } from "./ports/logger-options"
