export { configureLogger, formatLabel, getLogger, resetLogger, type Logger, type LoggerOverrides } from './logger.js';
export { logLevelsSchema, validateLoggerEnv, type LogLevel, type LoggerEnvConfig } from './env.schema.js';
