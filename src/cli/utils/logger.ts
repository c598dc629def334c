import pino from 'pino';

export interface LoggerOptions {
  level?: string;
  /** Defaults to stderr; stdout carries command output */
  destination?: pino.DestinationStream;
}

/**
 * Create a Pino logger with structured JSON output and credential redaction
 *
 * - Log level from LOG_LEVEL env var (default: 'warn')
 * - Written to stderr so stdout stays machine-readable
 * - Registry credentials and secret-looking env entries are redacted
 */
export function createLogger(options: LoggerOptions = {}): pino.Logger {
  return pino(
    {
      level: options.level ?? process.env.LOG_LEVEL ?? 'warn',
      redact: {
        paths: [
          'token',
          '*.token',
          'password',
          '*.password',
          'secret',
          '*.secret',
          'authorization',
          '*.authorization',
          'credentials',
          '*.credentials',
          'authconfig',
          '*.authconfig',
          'registryAuth',
          '*.registryAuth',
          'DOCKER_AUTH_CONFIG',
          'env.DOCKER_AUTH_CONFIG',
        ],
        censor: '[REDACTED]',
      },
    },
    options.destination ?? pino.destination(2)
  );
}

/**
 * Re-export Logger type from pino for use in other modules
 */
export type { Logger } from 'pino';
