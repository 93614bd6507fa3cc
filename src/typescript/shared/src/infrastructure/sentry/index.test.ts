import * as Sentry from '@sentry/node';
import { captureException, flushSentry, initSentry } from './index';

jest.mock('@sentry/node', () => {
  const scope = { setContext: jest.fn() };
  return {
    init: jest.fn(),
    flush: jest.fn().mockResolvedValue(true),
    captureException: jest.fn(),
    withScope: jest.fn((callback: (s: typeof scope) => void) => callback(scope)),
  };
});

describe('sentry', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('does nothing without a DSN', async () => {
    initSentry({ environment: 'test' });
    await flushSentry();

    expect(Sentry.init).not.toHaveBeenCalled();
    expect(Sentry.flush).not.toHaveBeenCalled();
  });

  it('captures exceptions with context', () => {
    const error = new Error('boom');
    captureException(error, { activityId: 555 });

    expect(Sentry.captureException).toHaveBeenCalledWith(error);
  });

  it('initializes once and strips credentials from requests', async () => {
    initSentry({ dsn: 'https://public@example.invalid/1', environment: 'test' });
    initSentry({ dsn: 'https://public@example.invalid/1', environment: 'test' });

    expect(Sentry.init).toHaveBeenCalledTimes(1);

    const options = jest.mocked(Sentry.init).mock.calls[0][0];
    const event = {
      type: undefined,
      request: { headers: { authorization: 'Bearer test-token', cookie: 'a=b', accept: 'json' } },
    };
    const beforeSend = options?.beforeSend;
    expect(beforeSend).toBeDefined();
    const scrubbed = beforeSend?.(event, {});
    expect(scrubbed).toEqual({ request: { headers: { accept: 'json' } } });

    await flushSentry(500);
    expect(Sentry.flush).toHaveBeenCalledWith(500);
  });
});
