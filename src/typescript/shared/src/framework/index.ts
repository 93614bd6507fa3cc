import * as admin from 'firebase-admin';
import type * as winston from 'winston';
import { PubSub } from '@google-cloud/pubsub';
import type { CloudEvent, Request, Response } from '@google-cloud/functions-framework';
import { SeenMessageStore, UserTokenStore } from '../storage/firestore';
import { captureException, flushSentry, initSentry } from '../infrastructure/sentry';
import { logger } from './logger';
import { FrameworkResponse } from './response';

export { FrameworkResponse, redirect, html } from './response';
export type { FrameworkResponseOptions } from './response';
export { logger, createLogger, serializeErrors } from './logger';

/**
 * Trigger-independent view of an invocation. For CloudEvent triggers `body` is the
 * event's `data` and `method` is POST.
 */
export interface FrameworkRequest {
  method: string;
  path?: string;
  query: Record<string, string>;
  headers: Record<string, string | undefined>;
  body: unknown;
}

export interface FrameworkStores {
  tokens: UserTokenStore;
  messages: SeenMessageStore;
}

export interface FrameworkContext {
  stores: FrameworkStores;
  pubsub: PubSub;
  logger: winston.Logger;
  executionId: string;
}

export type FrameworkHandler = (req: FrameworkRequest, ctx: FrameworkContext) => Promise<unknown>;

export interface CloudFunctionOptions {
  /** Log component for the handler's child logger */
  component?: string;
}

export interface FrameworkRuntime {
  db: admin.firestore.Firestore;
  pubsub: PubSub;
}

let runtime: FrameworkRuntime | undefined;

/**
 * Clients shared by every invocation of this instance. Created on first use.
 */
export function getRuntime(): FrameworkRuntime {
  if (!runtime) {
    if (admin.apps.length === 0) {
      admin.initializeApp();
    }

    const environment = process.env.GOOGLE_CLOUD_PROJECT || 'strava-reporter-dev';
    initSentry({
      dsn: process.env.SENTRY_DSN,
      environment,
      release: process.env.SENTRY_RELEASE || process.env.K_REVISION || 'unknown',
      serverName: process.env.K_SERVICE,
      tracesSampleRate: environment.includes('prod') ? 0.1 : 1.0,
    }, logger);

    runtime = { db: admin.firestore(), pubsub: new PubSub() };
  }
  return runtime;
}

function normalizeQuery(query: Request['query']): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(query ?? {})) {
    if (typeof value === 'string') {
      result[key] = value;
    } else if (Array.isArray(value) && typeof value[0] === 'string') {
      result[key] = value[0];
    }
  }
  return result;
}

function normalizeHeaders(headers: Request['headers']): Record<string, string | undefined> {
  const result: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(headers ?? {})) {
    result[key] = Array.isArray(value) ? value.join(', ') : value;
  }
  return result;
}

function sendResult(res: Response, result: unknown): void {
  if (result instanceof FrameworkResponse) {
    for (const [name, value] of Object.entries(result.headers)) {
      res.set(name, value);
    }
    res.status(result.status);
    if (result.body === undefined) {
      res.end();
    } else if (typeof result.body === 'string') {
      res.send(result.body);
    } else {
      res.json(result.body);
    }
    return;
  }

  res.status(200);
  if (result === undefined) {
    res.end();
  } else {
    res.json(result);
  }
}

/**
 * Wrap a handler as a Cloud Function entry point that serves both HTTP and
 * CloudEvent triggers.
 *
 * HTTP: the handler's result is written to the response; a thrown error becomes a 500.
 * CloudEvent: a thrown error is rethrown so the platform redelivers the event.
 * Every thrown error is reported to Sentry.
 */
export const createCloudFunction = (handler: FrameworkHandler, options: CloudFunctionOptions = {}) => {
  return async (reqOrEvent: Request | CloudEvent<unknown>, res?: Response): Promise<void> => {
    const serviceName = process.env.K_SERVICE || 'unknown-function';
    const executionId = `${serviceName}-${Date.now()}`;
    const isHttp = !('specversion' in reqOrEvent);

    const preambleLogger = logger.child({ executionId, component: 'framework' });

    let req: FrameworkRequest;
    if ('specversion' in reqOrEvent) {
      req = { method: 'POST', query: {}, headers: {}, body: reqOrEvent.data };
      preambleLogger.debug('Incoming CloudEvent', { id: reqOrEvent.id, type: reqOrEvent.type, source: reqOrEvent.source });
    } else {
      req = {
        method: reqOrEvent.method,
        path: reqOrEvent.path,
        query: normalizeQuery(reqOrEvent.query),
        headers: normalizeHeaders(reqOrEvent.headers),
        body: reqOrEvent.body,
      };
      preambleLogger.debug('Incoming Request', { method: req.method, path: req.path, query: req.query });
    }

    try {
      const { db, pubsub } = getRuntime();
      const ctx: FrameworkContext = {
        stores: {
          tokens: new UserTokenStore(db),
          messages: new SeenMessageStore(db),
        },
        pubsub,
        logger: logger.child({ executionId, component: options.component ?? serviceName }),
        executionId,
      };

      if (isHttp && res) {
        res.set('x-execution-id', executionId);
      }

      const result = await handler(req, ctx);

      if (isHttp && res) {
        sendResult(res, result);
      }
      preambleLogger.info('Function completed successfully');
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      preambleLogger.error('Function failed', { error });

      captureException(error, {
        service: serviceName,
        execution_id: executionId,
        trigger_type: isHttp ? 'http' : 'cloudevent',
      }, preambleLogger);
      // The instance may be frozen as soon as we return
      await flushSentry(2000);

      if (!isHttp) {
        throw err;
      }
      if (res && !res.headersSent) {
        res.status(500).send('Internal Server Error');
      }
    }
  };
};
