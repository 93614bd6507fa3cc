import { z } from 'zod';
import { STRAVA_API_BASE } from '../../config';
import { stravaFailure } from '../../infrastructure/http';
import type { StravaCredentials } from '../../infrastructure/oauth';
import { PushSubscription, pushSubscriptionSchema } from '../../types/strava';

// Strava allows one push subscription per application; these are operator tools.

const createdSubscriptionSchema = z.object({ id: z.number().int() });

function subscriptionsUrl(credentials: StravaCredentials, id?: number): URL {
  const url = new URL(`${STRAVA_API_BASE}/push_subscriptions${id === undefined ? '' : `/${id}`}`);
  url.searchParams.set('client_id', credentials.clientId);
  url.searchParams.set('client_secret', credentials.clientSecret);
  return url;
}

async function ensureOk(response: Response): Promise<void> {
  const failure = await stravaFailure(response, '/push_subscriptions');
  if (failure) {
    throw failure;
  }
}

/**
 * @throws UpstreamUnavailableError on a non-2xx answer
 */
export async function listPushSubscriptions(credentials: StravaCredentials): Promise<PushSubscription[]> {
  const response = await fetch(subscriptionsUrl(credentials));
  await ensureOk(response);
  return z.array(pushSubscriptionSchema).parse(await response.json());
}

/**
 * Register the webhook callback. Strava calls the callback with a GET challenge
 * before answering, so the verifier must already be deployed.
 * @returns The new subscription id
 */
export async function createPushSubscription(
  credentials: StravaCredentials,
  callbackUrl: string,
  verifyToken: string
): Promise<number> {
  const body = new URLSearchParams({
    client_id: credentials.clientId,
    client_secret: credentials.clientSecret,
    callback_url: callbackUrl,
    verify_token: verifyToken,
  });

  const response = await fetch(`${STRAVA_API_BASE}/push_subscriptions`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    body,
  });
  await ensureOk(response);
  return createdSubscriptionSchema.parse(await response.json()).id;
}

export async function deletePushSubscription(credentials: StravaCredentials, id: number): Promise<void> {
  const response = await fetch(subscriptionsUrl(credentials, id), { method: 'DELETE' });
  await ensureOk(response);
}
