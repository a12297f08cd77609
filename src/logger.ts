import { pino, type Logger, type LoggerOptions } from 'pino';

export interface LoggerSettings {
  level?: string;
  pretty?: boolean;
}

export const REDACT_PATHS = [
  'req.headers.authorization',
  '*.apiKey',
  '*.token',
  'backends.*.apiKey',
  'backends.*.token',
];

export function createLogger(settings: LoggerSettings = {}): Logger {
  const options: LoggerOptions = {
    level: settings.level ?? process.env.LOG_LEVEL ?? 'info',
    redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
  };

  if (settings.pretty ?? process.env.NODE_ENV === 'development') {
    options.transport = { target: 'pino-pretty' };
  }

  return pino(options);
}
