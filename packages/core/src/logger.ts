import pino, { type Logger, type LoggerOptions } from 'pino';

/**
 * Clinical-grade logger with PHI redaction
 *
 * Donor and recipient records carry location, HLA typing and medical history.
 * None of these may reach the logs in clear text; identifiers (pair ids,
 * score ids) and computed scores are safe to log.
 */

// Patterns scrubbed from free-text values
const PHI_PATTERNS = {
  // Email addresses
  email: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,
  // Credentials embedded in connection strings
  connectionCredentials: /:\/\/[^:/\s]+:[^@/\s]+@/g,
  // JWT tokens
  jwt: /eyJ[a-zA-Z0-9_-]*\.eyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]*/g,
  // Bearer tokens
  bearer: /Bearer\s+[a-zA-Z0-9._-]+/gi,
};

// Fields to completely redact (case-insensitive matching)
const REDACTED_FIELDS = [
  'latitude',
  'longitude',
  'location',
  'hlatype',
  'medicalhistory',
  'password',
  'secret',
  'token',
  'apikey',
  'authorization',
  'cookie',
  'connectionstring',
  'databaseurl',
];

// Pino paths are case-sensitive, so list the spellings used on the wire
const REDACTION_PATHS = [
  'latitude',
  'longitude',
  'location',
  'hlaType',
  'medicalHistory',
  '*.latitude',
  '*.longitude',
  '*.location',
  '*.hlaType',
  '*.medicalHistory',
  '*.donor_latitude',
  '*.donor_longitude',
  '*.recipient_latitude',
  '*.recipient_longitude',
  '*.donor_location',
  '*.recipient_location',
  'connectionString',
  '*.connectionString',
  '*.authorization',
];

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

export interface CreateLoggerOptions {
  name: string;
  level?: string;
}

/**
 * Create a logger instance with PHI redaction
 */
export function createLogger(options: CreateLoggerOptions): Logger {
  const { name, level = process.env.LOG_LEVEL ?? 'info' } = options;

  const loggerOptions: LoggerOptions = {
    name,
    level,
    redact: {
      paths: REDACTION_PATHS,
      censor: '[REDACTED]',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    base: {},
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
      req: (req: { method?: string; url?: string; headers?: Record<string, string> }) =>
        redactObject({
          method: req.method,
          url: req.url,
          headers: req.headers,
        }),
      res: pino.stdSerializers.res,
    },
  };

  return pino(loggerOptions);
}

export type { Logger };
