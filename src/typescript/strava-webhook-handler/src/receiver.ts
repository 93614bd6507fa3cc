import {
  captureException,
  CLOUD_EVENT_SOURCE,
  CLOUD_EVENT_TYPES,
  CloudEventPublisher,
  flushSentry,
  FrameworkContext,
  FrameworkRequest,
  RelayEvent,
  stravaWebhookEventSchema,
  TOPICS,
} from '@strava-reporter/shared';

// Keeps the acknowledgement inside Strava's two second window
const REPORT_FLUSH_TIMEOUT_MS = 500;

export type ReceiveResult =
  | { status: 'Published'; activityId: number; messageId: string }
  | { status: 'Duplicate'; activityId: number }
  | { status: 'Ignored'; reason: string }
  | { status: 'Failed'; reason: string };

async function report(error: unknown, context: Record<string, unknown>, ctx: FrameworkContext): Promise<void> {
  const err = error instanceof Error ? error : new Error(String(error));
  captureException(err, { ...context, execution_id: ctx.executionId }, ctx.logger);
  await flushSentry(REPORT_FLUSH_TIMEOUT_MS);
}

/**
 * Accept a Strava webhook notification and hand new activities to the topic.
 *
 * Strava retries anything that isn't a fast 200, so every path resolves. Failures
 * after validation are logged and reported instead of surfacing as an error status.
 */
export async function receiveEvent(req: FrameworkRequest, ctx: FrameworkContext): Promise<ReceiveResult> {
  const { logger, stores, pubsub } = ctx;

  const parsed = stravaWebhookEventSchema.safeParse(req.body);
  if (!parsed.success) {
    logger.warn('Dropping malformed webhook payload', { issues: parsed.error.issues });
    return { status: 'Ignored', reason: 'Malformed payload' };
  }
  const event = parsed.data;

  if (event.object_type === 'athlete') {
    const authorized = event.updates?.authorized;
    if (authorized === 'false' || authorized === false) {
      logger.info('Athlete revoked access', { athleteId: event.owner_id });
    }
    return { status: 'Ignored', reason: 'Athlete event' };
  }

  if (event.aspect_type !== 'create') {
    logger.info('Ignoring activity event', { activityId: event.object_id, aspect: event.aspect_type });
    return { status: 'Ignored', reason: `Activity ${event.aspect_type}` };
  }

  const activityId = event.object_id;

  let isNew: boolean;
  try {
    isNew = await stores.messages.recordIfAbsent(activityId);
  } catch (error) {
    logger.error('Failed to record activity', { activityId, error });
    await report(error, { activity_id: activityId, stage: 'dedup' }, ctx);
    return { status: 'Failed', reason: 'Storage unavailable' };
  }

  if (!isNew) {
    logger.info('Duplicate activity event', { activityId });
    return { status: 'Duplicate', activityId };
  }

  const publisher = new CloudEventPublisher<RelayEvent>(
    pubsub,
    TOPICS.ACTIVITY_EVENTS,
    CLOUD_EVENT_SOURCE,
    CLOUD_EVENT_TYPES.ACTIVITY_CREATED,
    logger
  );

  try {
    const messageId = await publisher.publish({
      user_id: event.owner_id,
      activity_id: activityId,
      event_type: event.aspect_type,
    }, String(activityId));

    logger.info('Activity queued for announcement', { activityId, athleteId: event.owner_id, messageId });
    return { status: 'Published', activityId, messageId };
  } catch (error) {
    // The marker is already written, so this event will not be announced
    logger.error('Failed to publish activity event', { activityId, error });
    await report(error, { activity_id: activityId, stage: 'publish' }, ctx);
    return { status: 'Failed', reason: 'Publish failed' };
  }
}
