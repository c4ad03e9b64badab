import pino, { type Logger, type LoggerOptions } from 'pino';

/**
 * Clinical logger with PHI redaction
 * Patient identifiers never reach log output; scores, levels and
 * treatment ids are not identifying and are logged as-is.
 */

// Identifier patterns scrubbed from free-text values
const PHI_PATTERNS = {
  // Australian Medicare number (10 digits, optional IRN)
  medicare: /\b[2-6]\d{3}\s?\d{5}\s?\d(?:\s?\d)?\b/g,
  // Dates of birth in dd/mm/yyyy or yyyy-mm-dd
  date: /\b(?:\d{1,2}\/\d{1,2}\/\d{4}|\d{4}-\d{2}-\d{2})\b/g,
  email: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,
  // International phone format (E.164)
  phoneE164: /\+[1-9]\d{7,14}/g,
};

// Fields to completely redact
const REDACTED_KEYS = [
  'patientId',
  'mrn',
  'medicare',
  'name',
  'firstName',
  'lastName',
  'fullName',
  'dateOfBirth',
  'dob',
  'email',
  'phone',
  'address',
  'notes',
];

// Case-insensitive matching for redactObject
const REDACTED_FIELDS = REDACTED_KEYS.map((key) => key.toLowerCase());

/**
 * Recursively redact PHI from an object
 */
export function redactObject(obj: unknown): unknown {
  if (obj === null || obj === undefined) {
    return obj;
  }

  if (typeof obj === 'string') {
    let result = obj;
    for (const pattern of Object.values(PHI_PATTERNS)) {
      result = result.replace(pattern, '[REDACTED]');
    }
    return result;
  }

  if (Array.isArray(obj)) {
    return obj.map(redactObject);
  }

  if (typeof obj === 'object') {
    const redacted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      const keyLower = key.toLowerCase();
      const shouldRedact = REDACTED_FIELDS.some(
        (field) => keyLower === field || keyLower.includes(field)
      );
      redacted[key] = shouldRedact ? '[REDACTED]' : redactObject(value);
    }
    return redacted;
  }

  return obj;
}

/**
 * Pino redaction paths: top level and one level deep
 */
function createRedactor() {
  return {
    paths: REDACTED_KEYS.flatMap((key) => [key, `*.${key}`]),
    censor: '[REDACTED]',
  };
}

export interface CreateLoggerOptions {
  name: string;
  level?: string;
  correlationId?: string;
}

/**
 * Create a logger instance with PHI redaction
 */
export function createLogger(options: CreateLoggerOptions): Logger {
  const { name, level = process.env.LOG_LEVEL ?? 'info', correlationId } = options;

  const loggerOptions: LoggerOptions = {
    name,
    level,
    redact: createRedactor(),
    formatters: {
      level: (label) => ({ level: label }),
    },
    // Use null to omit base, or provide correlationId if present
    base: correlationId ? { correlationId } : null,
    serializers: {
      err: pino.stdSerializers.err,
    },
  };

  return pino(loggerOptions);
}

/**
 * Create a child logger with correlation ID
 */
export function withCorrelationId(logger: Logger, correlationId: string): Logger {
  return logger.child({ correlationId });
}

/**
 * Generate a correlation ID
 */
export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 11)}`;
}

// Default logger instance
export const logger = createLogger({ name: 'kp-cdst' });

export type { Logger };
