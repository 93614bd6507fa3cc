import type { Logger } from 'winston';
import { z } from 'zod';
import { STRAVA_API_BASE } from '../../config';
import { AuthenticationError, UpstreamUnavailableError } from '../../errors';
import { stravaFailure } from '../../infrastructure/http';
import type { TokenSource } from '../../infrastructure/oauth';
import { StravaActivity, stravaActivitySchema, StravaAthlete, stravaAthleteSchema } from '../../types/strava';

/**
 * Read-only Strava API client acting on behalf of one athlete.
 *
 * Every request carries the athlete's bearer token. A 401 forces one token refresh
 * and a single retry; a second 401 is an AuthenticationError.
 */
export class StravaClient {
  constructor(
    private tokens: TokenSource,
    private logger?: Logger,
    private baseUrl: string = STRAVA_API_BASE
  ) {}

  async getActivity(activityId: number): Promise<StravaActivity> {
    return this.get(`/activities/${activityId}`, stravaActivitySchema);
  }

  /** The authenticated athlete. */
  async getAthlete(): Promise<StravaAthlete> {
    return this.get('/athlete', stravaAthleteSchema);
  }

  private async get<S extends z.ZodTypeAny>(path: string, schema: S): Promise<z.output<S>> {
    const url = `${this.baseUrl}${path}`;
    let response = await this.send(url, false);

    if (response.status === 401) {
      this.logger?.info('Strava returned 401, retrying with a refreshed token', { path });
      response = await this.send(url, true);
      if (response.status === 401) {
        throw new AuthenticationError(`Strava rejected the refreshed token for ${path}`);
      }
    }

    const failure = await stravaFailure(response, path);
    if (failure) {
      this.logger?.warn('Strava request failed', { path, status: failure.status, body: failure.body });
      throw failure;
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new UpstreamUnavailableError(`Strava ${path} returned invalid JSON`, response.status, { cause: error });
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new UpstreamUnavailableError(`Strava ${path} returned an unexpected payload`, response.status, { cause: parsed.error });
    }
    return parsed.data;
  }

  private async send(url: string, forceRefresh: boolean): Promise<Response> {
    const token = await this.tokens.getToken(forceRefresh);
    try {
      return await fetch(url, {
        headers: {
          Authorization: `Bearer ${token.accessToken}`,
          Accept: 'application/json',
        },
      });
    } catch (error) {
      throw new UpstreamUnavailableError(`Strava request to ${url} failed`, undefined, { cause: error });
    }
  }
}
