import { DeliveryError, UpstreamUnavailableError } from '../../errors';

/** Longest excerpt of an upstream error body kept on an error or a log entry. */
export const MAX_ERROR_BODY_SIZE = 500;

export function excerpt(body: string, maxLen: number = MAX_ERROR_BODY_SIZE): string {
  if (body.length <= maxLen) return body;
  return body.substring(0, maxLen) + '...';
}

function failureMessage(prefix: string, status: number, body: string): string {
  return body ? `${prefix} ${status}: ${body}` : `${prefix} ${status}`;
}

/**
 * Maps a non-2xx Strava answer to an UpstreamUnavailableError carrying the status
 * and a bounded excerpt of the body. Returns null for a successful response.
 */
export async function stravaFailure(response: Response, path: string): Promise<UpstreamUnavailableError | null> {
  if (response.ok) return null;

  const body = excerpt(await response.text());
  return new UpstreamUnavailableError(failureMessage(`Strava ${path} returned`, response.status, body), response.status, { body });
}

/**
 * Maps a Discord webhook refusal to a DeliveryError. Returns null for a successful response.
 */
export async function discordFailure(response: Response): Promise<DeliveryError | null> {
  if (response.ok) return null;

  const body = excerpt(await response.text(), 200);
  return new DeliveryError(failureMessage('Discord webhook returned', response.status, body), response.status);
}
