export {
  createLogger,
  withCorrelationId,
  generateCorrelationId,
  redactObject,
  logger,
  type Logger,
  type CreateLoggerOptions,
} from './logger.js';

export {
  AppError,
  ValidationError,
  ReferenceDataError,
  ConfigurationError,
  isOperationalError,
  toSafeErrorResponse,
  type SafeErrorDetails,
} from './errors.js';

export {
  EngineEnvSchema,
  validateEnv,
  getEnv,
  resetEnvCache,
  uptakeFraction,
  type EngineEnv,
} from './env.js';
