import { Command } from 'commander';
import {
  buildAuthorizeUrl,
  generateOAuthState,
  getOptionalSecret,
  getSecret,
  UserTokenStore,
} from '@strava-reporter/shared';
import { getAdminDb } from '../firebase';

const mask = (token: string) => (token.length > 8 ? `${token.slice(0, 4)}…${token.slice(-4)}` : '****');

export function addTokenCommands(program: Command) {
  program.command('tokens:get <athleteId>')
    .description('Show the stored Strava token for an athlete')
    .action(async (athleteId: string) => {
      const id = Number(athleteId);
      if (!Number.isInteger(id)) {
        console.error(`Invalid athlete id: ${athleteId}`);
        process.exitCode = 1;
        return;
      }

      try {
        const token = await new UserTokenStore(getAdminDb()).get(id);
        if (!token) {
          console.log(`No token stored for athlete ${id}`);
          return;
        }
        const expired = token.expiresAt.getTime() < Date.now();
        console.log(`Athlete:       ${token.userId}`);
        console.log(`Access token:  ${mask(token.accessToken)}`);
        console.log(`Refresh token: ${mask(token.refreshToken)}`);
        console.log(`Expires at:    ${token.expiresAt.toISOString()}${expired ? ' (expired)' : ''}`);
        if (token.updatedAt) {
          console.log(`Updated at:    ${token.updatedAt.toISOString()}`);
        }
      } catch (error) {
        console.error('Failed to read token:', error);
        process.exitCode = 1;
      }
    });

  program.command('authorize-url')
    .description('Print the Strava consent URL athletes should open')
    .option('--redirect-uri <uri>', 'Callback URL (defaults to STRAVA_REDIRECT_URI)')
    .action(async (options: { redirectUri?: string }) => {
      try {
        const redirectUri = options.redirectUri ?? await getSecret('STRAVA_REDIRECT_URI');
        const clientId = await getSecret('STRAVA_CLIENT_ID');
        const stateSecret = await getOptionalSecret('OAUTH_STATE_SECRET');
        console.log(buildAuthorizeUrl(clientId, redirectUri, stateSecret ? generateOAuthState(stateSecret) : undefined));
      } catch (error) {
        console.error('Failed to build authorize URL:', error);
        process.exitCode = 1;
      }
    });
}
