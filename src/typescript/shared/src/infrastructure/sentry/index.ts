import * as Sentry from '@sentry/node';
import type { Logger } from 'winston';

export interface SentryConfig {
  dsn?: string;
  environment: string;
  release?: string;
  serverName?: string;
  tracesSampleRate?: number;
}

let initialized = false;

/**
 * Initialize Sentry for Cloud Functions.
 * Safe to call multiple times - will only initialize once.
 */
export function initSentry(config: SentryConfig, logger?: Logger): void {
  if (initialized) {
    return;
  }
  if (!config.dsn) {
    logger?.debug('Sentry DSN not configured - error tracking disabled');
    return;
  }

  try {
    const { dsn, environment, release, serverName, tracesSampleRate } = config;

    Sentry.init({
      dsn,
      environment,
      release,
      serverName,
      tracesSampleRate: tracesSampleRate ?? 0.1,
      beforeSend(event) {
        // Tokens travel in these
        if (event.request?.headers) {
          delete event.request.headers['authorization'];
          delete event.request.headers['cookie'];
        }
        return event;
      },
    });
    initialized = true;

    logger?.info('Sentry initialized', { environment, release });
  } catch (error) {
    logger?.error('Failed to initialize Sentry', { error });
  }
}

/**
 * Capture an exception in Sentry with additional context.
 */
export function captureException(
  error: Error,
  context?: Record<string, unknown>,
  logger?: Logger
): void {
  try {
    Sentry.withScope((scope) => {
      if (context) {
        scope.setContext('additional', context);
      }
      Sentry.captureException(error);
    });
    logger?.debug('Exception captured in Sentry', { error: error.message });
  } catch (err) {
    logger?.error('Failed to capture exception in Sentry', { error: err });
  }
}

/**
 * Drain queued events before the function instance is frozen.
 */
export async function flushSentry(timeoutMs = 2000): Promise<void> {
  if (!initialized) {
    return;
  }
  await Sentry.flush(timeoutMs);
}
