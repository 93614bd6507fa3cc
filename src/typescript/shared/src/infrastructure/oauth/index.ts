import * as crypto from 'crypto';
import { getSecret } from '../secrets';
import { STRAVA_OAUTH_BASE, STRAVA_SCOPES } from '../../config';
import { AuthenticationError, TokenExchangeError } from '../../errors';
import { stravaTokenResponseSchema, StravaAthlete } from '../../types/strava';

export { StoredTokenSource } from './token-source';
export type { Token, TokenSource, TokenRefresher } from './token-source';

// State tokens are valid for 10 minutes
const STATE_TTL_MS = 10 * 60 * 1000;

export interface StravaCredentials {
  clientId: string;
  clientSecret: string;
}

export interface TokenGrant {
  userId: number;
  accessToken: string;
  refreshToken: string;
  expiresAt: Date;
  athlete?: StravaAthlete;
}

export async function getStravaCredentials(): Promise<StravaCredentials> {
  const [clientId, clientSecret] = await Promise.all([
    getSecret('STRAVA_CLIENT_ID'),
    getSecret('STRAVA_CLIENT_SECRET'),
  ]);
  return { clientId, clientSecret };
}

function sign(payload: string, secret: string): string {
  return crypto.createHmac('sha256', secret).update(payload).digest('hex');
}

/**
 * Generate a signed OAuth state token.
 * @returns Base64url-encoded `{ payload, signature }`
 */
export function generateOAuthState(secret: string, now: number = Date.now()): string {
  const payload = JSON.stringify({
    nonce: crypto.randomBytes(16).toString('hex'),
    expiresAt: now + STATE_TTL_MS,
  });
  const state = { payload, signature: sign(payload, secret) };
  return Buffer.from(JSON.stringify(state)).toString('base64url');
}

/**
 * Validate an OAuth state token produced by generateOAuthState.
 * Returns false for tampered, malformed or expired tokens.
 */
export function validateOAuthState(state: string, secret: string, now: number = Date.now()): boolean {
  let decoded: unknown;
  try {
    decoded = JSON.parse(Buffer.from(state, 'base64url').toString());
  } catch {
    return false;
  }

  if (typeof decoded !== 'object' || decoded === null || !('payload' in decoded) || !('signature' in decoded)) {
    return false;
  }
  const { payload, signature } = decoded;
  if (typeof payload !== 'string' || typeof signature !== 'string') {
    return false;
  }

  const expected = Buffer.from(sign(payload, secret));
  const actual = Buffer.from(signature);
  if (expected.length !== actual.length || !crypto.timingSafeEqual(expected, actual)) {
    return false;
  }

  let claims: unknown;
  try {
    claims = JSON.parse(payload);
  } catch {
    return false;
  }
  if (typeof claims !== 'object' || claims === null || !('expiresAt' in claims)) {
    return false;
  }
  return typeof claims.expiresAt === 'number' && now <= claims.expiresAt;
}

/**
 * Build the Strava consent page URL the athlete is sent to.
 */
export function buildAuthorizeUrl(clientId: string, redirectUri: string, state?: string): string {
  const url = new URL(`${STRAVA_OAUTH_BASE}/authorize`);
  url.searchParams.set('client_id', clientId);
  url.searchParams.set('redirect_uri', redirectUri);
  url.searchParams.set('response_type', 'code');
  url.searchParams.set('approval_prompt', 'auto');
  url.searchParams.set('scope', STRAVA_SCOPES);
  if (state) {
    url.searchParams.set('state', state);
  }
  return url.toString();
}

/**
 * Exchange an authorization code for tokens.
 * @throws TokenExchangeError on a non-2xx answer or a response without an athlete
 */
export async function exchangeAuthorizationCode(code: string, credentials: StravaCredentials): Promise<TokenGrant> {
  const response = await fetch(`${STRAVA_OAUTH_BASE}/token`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({
      client_id: credentials.clientId,
      client_secret: credentials.clientSecret,
      code,
      grant_type: 'authorization_code',
    }),
  });

  if (!response.ok) {
    throw new TokenExchangeError(response.status, await response.text());
  }

  const parsed = stravaTokenResponseSchema.safeParse(await response.json());
  if (!parsed.success || !parsed.data.athlete) {
    throw new TokenExchangeError(response.status, 'Token response missing athlete or tokens');
  }

  const { access_token, refresh_token, expires_at, athlete } = parsed.data;
  return {
    userId: athlete.id,
    accessToken: access_token,
    refreshToken: refresh_token,
    expiresAt: new Date(expires_at * 1000),
    athlete,
  };
}

/**
 * Refresh tokens with Strava using the refresh token.
 * Strava may rotate the refresh token; the returned one must replace the stored one.
 * @throws AuthenticationError if Strava refuses the refresh
 */
export async function refreshAccessToken(
  refreshToken: string,
  credentials: StravaCredentials
): Promise<{ accessToken: string; refreshToken: string; expiresAt: Date }> {
  const body = new URLSearchParams({
    client_id: credentials.clientId,
    client_secret: credentials.clientSecret,
    grant_type: 'refresh_token',
    refresh_token: refreshToken,
  });

  const response = await fetch(`${STRAVA_OAUTH_BASE}/token`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    body,
  });

  if (!response.ok) {
    const errorText = await response.text();
    throw new AuthenticationError(`Token refresh failed: ${response.status} ${errorText}`);
  }

  const parsed = stravaTokenResponseSchema.safeParse(await response.json());
  if (!parsed.success) {
    throw new AuthenticationError('Invalid refresh response from Strava', { cause: parsed.error });
  }

  return {
    accessToken: parsed.data.access_token,
    refreshToken: parsed.data.refresh_token,
    expiresAt: new Date(parsed.data.expires_at * 1000),
  };
}
