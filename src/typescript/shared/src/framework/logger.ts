import * as winston from 'winston';

// Flatten Error objects (message, stack and custom properties) so they survive JSON
export function serializeErrors(value: unknown): unknown {
  if (value instanceof Error) {
    const extra: Record<string, unknown> = {};
    for (const key of Object.getOwnPropertyNames(value)) {
      if (!['message', 'name', 'stack'].includes(key)) {
        extra[key] = serializeErrors(Reflect.get(value, key));
      }
    }
    return { message: value.message, name: value.name, stack: value.stack, ...extra };
  }
  if (Array.isArray(value)) {
    return value.map(serializeErrors);
  }
  if (value && typeof value === 'object' && !(value instanceof Date)) {
    const result: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      result[key] = serializeErrors(inner);
    }
    return result;
  }
  return value;
}

const SEVERITY: Record<string, string> = {
  error: 'ERROR',
  warn: 'WARNING',
  info: 'INFO',
  debug: 'DEBUG',
};

/**
 * Shape one log entry the way Cloud Logging reads structured stdout.
 */
export function toGcpEntry(info: winston.Logform.TransformableInfo): Record<string, unknown> {
  const { level, message, ...rest } = info;
  return {
    timestamp: info.timestamp,
    ...rest,
    severity: SEVERITY[level] ?? level.toUpperCase(),
    message: info.component ? `[${String(info.component)}] ${String(message)}` : message,
  };
}

// Mutates in place: winston keeps its level and message under symbol keys
const errorSerializer = winston.format((info) => {
  for (const key of Object.keys(info)) {
    info[key] = serializeErrors(info[key]);
  }
  return info;
});

export function createLogger(level: string = process.env.LOG_LEVEL || 'info'): winston.Logger {
  return winston.createLogger({
    level: level.toLowerCase(),
    format: errorSerializer(),
    defaultMeta: { service: process.env.K_SERVICE || 'unknown-service' },
    transports: [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.timestamp(),
          winston.format.printf((info) => JSON.stringify(toGcpEntry(info)))
        ),
      }),
    ],
  });
}

export const logger = createLogger();
