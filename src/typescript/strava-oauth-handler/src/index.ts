import {
  athleteName,
  buildAuthorizeUrl,
  createCloudFunction,
  exchangeAuthorizationCode,
  FrameworkContext,
  FrameworkRequest,
  generateOAuthState,
  getOptionalSecret,
  getSecret,
  getStravaCredentials,
  html,
  redirect,
  TokenExchangeError,
  TokenGrant,
  validateOAuthState,
} from '@strava-reporter/shared';
import { errorPage, successPage } from './pages';

const ACTIVITY_SCOPES = ['activity:read', 'activity:read_all'];

function grantsActivityAccess(scope: string): boolean {
  return scope.split(',').some((s) => ACTIVITY_SCOPES.includes(s.trim()));
}

export const handler = async (req: FrameworkRequest, ctx: FrameworkContext) => {
  const { stores, logger } = ctx;
  const { code, state, scope, error } = req.query;

  // Handle authorization denial
  if (error) {
    logger.warn('User denied Strava authorization', { error });
    return html(400, errorPage('Strava authorization was denied.'));
  }

  const stateSecret = await getOptionalSecret('OAUTH_STATE_SECRET');

  // Bare visit: start the flow
  if (!code && !state) {
    const redirectUri = await getOptionalSecret('STRAVA_REDIRECT_URI');
    if (!redirectUri) {
      logger.error('STRAVA_REDIRECT_URI is not configured');
      return html(400, errorPage('Missing authorization code.'));
    }
    const clientId = await getSecret('STRAVA_CLIENT_ID');
    const signedState = stateSecret ? generateOAuthState(stateSecret) : undefined;
    return redirect(buildAuthorizeUrl(clientId, redirectUri, signedState));
  }

  if (!code) {
    logger.warn('Missing authorization code');
    return html(400, errorPage('Missing authorization code.'));
  }

  // Validate state token (CSRF protection)
  if (stateSecret && (!state || !validateOAuthState(state, stateSecret))) {
    logger.warn('Invalid or expired state token');
    return html(400, errorPage('This authorization link has expired. Please start again.'));
  }

  if (scope !== undefined && !grantsActivityAccess(scope)) {
    logger.warn('Authorization without activity access', { scope });
    return html(400, errorPage('Access to your activities is required. Please allow "View data about your activities".'));
  }

  const credentials = await getStravaCredentials();

  let grant: TokenGrant;
  try {
    grant = await exchangeAuthorizationCode(code, credentials);
  } catch (err) {
    if (err instanceof TokenExchangeError) {
      logger.warn('Failed to exchange code for tokens', { status: err.status, body: err.body });
      return html(400, errorPage('Strava did not accept this authorization. Please start again.'));
    }
    throw err;
  }

  await stores.tokens.save({
    userId: grant.userId,
    accessToken: grant.accessToken,
    refreshToken: grant.refreshToken,
    expiresAt: grant.expiresAt,
    updatedAt: new Date(),
  });

  logger.info('Successfully connected Strava account', { athleteId: grant.userId, scope });

  const name = grant.athlete ? athleteName(grant.athlete) : `athlete ${grant.userId}`;
  return html(200, successPage(name));
};

export const stravaOAuthHandler = createCloudFunction(handler, { component: 'strava-oauth' });
