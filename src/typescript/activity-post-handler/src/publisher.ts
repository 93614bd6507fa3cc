import {
  AuthenticationError,
  buildActivityMessage,
  CloudEventPublisher,
  DiscordWebhookClient,
  FrameworkContext,
  FrameworkRequest,
  getSecret,
  getStravaCredentials,
  MissingTokenError,
  refreshAccessToken,
  relayEventSchema,
  StoredTokenSource,
  StravaActivity,
  StravaAthlete,
  StravaClient,
  UpstreamUnavailableError,
} from '@strava-reporter/shared';

export type PostResult =
  | { status: 'Posted'; activityId: number; discordMessageId: string; tokenRefreshes: number }
  | { status: 'Skipped'; reason: string };

/**
 * Announce one relayed activity in the Discord channel.
 *
 * Returns a Skipped result for events that can never succeed (malformed, no token,
 * Strava refusing). Storage and Discord failures throw so the topic redelivers.
 */
export async function postActivity(req: FrameworkRequest, ctx: FrameworkContext): Promise<PostResult> {
  const { logger, stores } = ctx;

  const parsed = relayEventSchema.safeParse(CloudEventPublisher.unwrap(req.body));
  if (!parsed.success) {
    logger.warn('Dropping malformed relay message', { issues: parsed.error.issues });
    return { status: 'Skipped', reason: 'Malformed message' };
  }
  const { user_id: athleteId, activity_id: activityId, event_type: eventType } = parsed.data;

  if (eventType !== 'create') {
    logger.info('Only new activities are announced', { activityId, eventType });
    return { status: 'Skipped', reason: `Event ${eventType}` };
  }

  const stored = await stores.tokens.get(athleteId);
  if (!stored) {
    logger.error('Cannot announce activity', { activityId, error: new MissingTokenError(athleteId) });
    return { status: 'Skipped', reason: 'Missing token' };
  }

  const tokenSource = new StoredTokenSource(
    stores.tokens,
    stored,
    async (refreshToken) => refreshAccessToken(refreshToken, await getStravaCredentials())
  );
  const strava = new StravaClient(tokenSource, logger);

  let activity: StravaActivity;
  let athlete: StravaAthlete;
  try {
    activity = await strava.getActivity(activityId);
    athlete = await strava.getAthlete();
  } catch (error) {
    if (error instanceof AuthenticationError || error instanceof UpstreamUnavailableError) {
      logger.error('Strava lookup failed, dropping event', { activityId, athleteId, error });
      return { status: 'Skipped', reason: error.name };
    }
    throw error;
  }

  const discord = new DiscordWebhookClient(await getSecret('DISCORD_WEBHOOK_URL'), logger);
  const discordMessageId = await discord.send(buildActivityMessage(activity, athlete));

  logger.info('Activity announced', {
    activityId,
    athleteId,
    discordMessageId,
    tokenRefreshes: tokenSource.refreshes,
  });
  return { status: 'Posted', activityId, discordMessageId, tokenRefreshes: tokenSource.refreshes };
}
