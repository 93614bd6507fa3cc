import type { Logger } from 'winston';
import { DeliveryError, FrameworkContext, StorageError, UserToken, UserTokenStore } from '@strava-reporter/shared';
import { postActivity } from './publisher';

const NOW = Date.now();

const activity = {
  id: 555,
  name: 'Morning Run',
  type: 'Run',
  distance: 5000,
  moving_time: 1500,
  elapsed_time: 1550,
  total_elevation_gain: 12,
  average_speed: 3.33,
  start_date: '2024-05-01T06:30:00Z',
};
const athlete = { id: 42, firstname: 'Ada', lastname: 'Runner', profile_medium: null };

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

function pushBody(data: unknown) {
  const envelope = { specversion: '1.0', id: 'ce-1', type: 'strava.activity.created', source: '/strava/webhook', data };
  return { message: { data: Buffer.from(JSON.stringify(envelope)).toString('base64') }, subscription: 'sub' };
}

describe('postActivity', () => {
  let fetchMock: jest.SpyInstance;
  let tokens: { get: jest.Mock; save: jest.Mock };
  let logger: { info: jest.Mock; warn: jest.Mock; error: jest.Mock; debug: jest.Mock };
  let ctx: FrameworkContext;
  let stravaAuthorizations: string[];

  const validToken: UserToken = {
    userId: 42,
    accessToken: 'access-token',
    refreshToken: 'refresh-token',
    expiresAt: new Date(NOW + 3600 * 1000),
  };

  const post = (data: unknown = { user_id: 42, activity_id: 555, event_type: 'create' }) =>
    postActivity({ method: 'POST', query: {}, headers: {}, body: pushBody(data) }, ctx);

  // Routes fetch by URL; overrides win over the defaults
  function route(overrides: Record<string, () => Response> = {}) {
    fetchMock.mockImplementation(async (input: string | URL, init?: RequestInit) => {
      const url = input.toString();
      const headers = new Headers(init?.headers);
      if (url.startsWith('https://www.strava.com/api/v3')) {
        stravaAuthorizations.push(headers.get('Authorization') ?? '');
      }
      for (const [prefix, respond] of Object.entries(overrides)) {
        if (url.startsWith(prefix)) return respond();
      }
      if (url === 'https://www.strava.com/api/v3/activities/555') return jsonResponse(activity);
      if (url === 'https://www.strava.com/api/v3/athlete') return jsonResponse(athlete);
      if (url === 'https://www.strava.com/oauth/token') {
        return jsonResponse({ access_token: 'new-access', refresh_token: 'new-refresh', expires_at: Math.floor(NOW / 1000) + 21600 });
      }
      if (url.startsWith('https://discord.test/')) return jsonResponse({ id: '9001' });
      throw new Error(`Unexpected fetch ${url}`);
    });
  }

  beforeEach(() => {
    process.env.STRAVA_CLIENT_ID = '1234';
    process.env.STRAVA_CLIENT_SECRET = 'test-secret';
    process.env.DISCORD_WEBHOOK_URL = 'https://discord.test/api/webhooks/1/test-token';
    fetchMock = jest.spyOn(global, 'fetch');
    stravaAuthorizations = [];
    tokens = { get: jest.fn().mockResolvedValue(validToken), save: jest.fn().mockResolvedValue(undefined) };
    logger = { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() };
    ctx = {
      stores: { tokens: tokens as unknown as UserTokenStore },
      logger: logger as unknown as Logger,
      executionId: 'exec-1',
    } as unknown as FrameworkContext;
    route();
  });

  afterEach(() => {
    fetchMock.mockRestore();
    delete process.env.STRAVA_CLIENT_ID;
    delete process.env.STRAVA_CLIENT_SECRET;
    delete process.env.DISCORD_WEBHOOK_URL;
  });

  it('fetches the activity and posts it to Discord', async () => {
    const result = await post();

    expect(result).toEqual({ status: 'Posted', activityId: 555, discordMessageId: '9001', tokenRefreshes: 0 });
    expect(stravaAuthorizations).toEqual(['Bearer access-token', 'Bearer access-token']);
    expect(tokens.save).not.toHaveBeenCalled();

    const discordCall = fetchMock.mock.calls.find(([url]) => url.toString().startsWith('https://discord.test/'));
    const payload = JSON.parse(discordCall?.[1]?.body);
    expect(payload.content).toBe('*Ada Runner posted a new activity:* Morning Run (Run) 5.00 km in 25:00');
    expect(payload.username).toBe('Strava Webhook');
    expect(payload.embeds[0].title).toBe('Morning Run');
  });

  it('refreshes an expired token once before calling Strava', async () => {
    tokens.get.mockResolvedValue({ ...validToken, expiresAt: new Date(NOW - 1000) });

    const result = await post();

    expect(result).toMatchObject({ status: 'Posted', tokenRefreshes: 1 });
    expect(fetchMock.mock.calls.filter(([url]) => url === 'https://www.strava.com/oauth/token')).toHaveLength(1);
    expect(tokens.save).toHaveBeenCalledTimes(1);
    expect(tokens.save).toHaveBeenCalledWith(expect.objectContaining({
      userId: 42,
      accessToken: 'new-access',
      refreshToken: 'new-refresh',
    }));
    expect(stravaAuthorizations).toEqual(['Bearer new-access', 'Bearer new-access']);
  });

  it('makes no network call when the athlete has no token', async () => {
    tokens.get.mockResolvedValue(null);

    const result = await post({ user_id: 7, activity_id: 555, event_type: 'create' });

    expect(result).toEqual({ status: 'Skipped', reason: 'Missing token' });
    expect(fetchMock).not.toHaveBeenCalled();
    expect(logger.error).toHaveBeenCalledWith('Cannot announce activity', expect.objectContaining({ activityId: 555 }));
  });

  it('drops malformed messages', async () => {
    const result = await post({ activity_id: 'x' });

    expect(result).toEqual({ status: 'Skipped', reason: 'Malformed message' });
    expect(tokens.get).not.toHaveBeenCalled();
  });

  it('drops the event when Strava is unavailable', async () => {
    route({ 'https://www.strava.com/api/v3/activities/': () => jsonResponse({ message: 'Record Not Found' }, 404) });

    const result = await post();

    expect(result).toEqual({ status: 'Skipped', reason: 'UpstreamUnavailableError' });
    expect(fetchMock.mock.calls.some(([url]) => url.toString().startsWith('https://discord.test/'))).toBe(false);
  });

  it('drops the event when the activity has an unreadable start date', async () => {
    route({ 'https://www.strava.com/api/v3/activities/': () => jsonResponse({ ...activity, start_date: 'not-a-date' }) });

    const result = await post();

    expect(result).toEqual({ status: 'Skipped', reason: 'UpstreamUnavailableError' });
    expect(fetchMock.mock.calls.some(([url]) => url.toString().startsWith('https://discord.test/'))).toBe(false);
  });

  it('drops the event when the refresh is refused', async () => {
    tokens.get.mockResolvedValue({ ...validToken, expiresAt: new Date(NOW - 1000) });
    route({ 'https://www.strava.com/oauth/token': () => jsonResponse({ message: 'Bad Request' }, 400) });

    const result = await post();

    expect(result).toEqual({ status: 'Skipped', reason: 'AuthenticationError' });
    expect(tokens.save).not.toHaveBeenCalled();
  });

  it('throws Discord failures so the message is redelivered', async () => {
    route({ 'https://discord.test/': () => new Response('rate limited', { status: 429 }) });

    await expect(post()).rejects.toBeInstanceOf(DeliveryError);
  });

  it('throws storage failures', async () => {
    tokens.get.mockRejectedValue(new StorageError('Failed to read token for athlete 42'));

    await expect(post()).rejects.toBeInstanceOf(StorageError);
  });
});
