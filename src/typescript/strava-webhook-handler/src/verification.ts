import * as crypto from 'crypto';
import { FrameworkContext, FrameworkRequest, FrameworkResponse, getSecret } from '@strava-reporter/shared';

// Hash both sides so the comparison takes the same time whatever the lengths
function tokensMatch(provided: string, expected: string): boolean {
  const a = crypto.createHash('sha256').update(provided).digest();
  const b = crypto.createHash('sha256').update(expected).digest();
  return crypto.timingSafeEqual(a, b);
}

/**
 * Answer Strava's subscription handshake.
 * https://developers.strava.com/docs/webhooks/
 */
export async function verifySubscription(req: FrameworkRequest, ctx: FrameworkContext): Promise<FrameworkResponse> {
  const { logger } = ctx;
  const challenge = req.query['hub.challenge'];

  if (!challenge) {
    logger.warn('Verification request without hub.challenge');
    return new FrameworkResponse({ status: 400 });
  }

  const expected = await getSecret('STRAVA_VERIFY_TOKEN');
  if (!tokensMatch(req.query['hub.verify_token'] ?? '', expected)) {
    logger.warn('Verification request with wrong verify token', { mode: req.query['hub.mode'] });
    return new FrameworkResponse({ status: 403 });
  }

  logger.info('Subscription challenge accepted');
  return new FrameworkResponse({ status: 200, body: { 'hub.challenge': challenge } });
}
