export * from './config';
export * from './errors';
export * from './types';
export * from './framework';
export * from './storage/firestore';
export * from './infrastructure/secrets';
export * from './infrastructure/http';
export * from './infrastructure/oauth';
export { CloudEventPublisher } from './infrastructure/pubsub/cloud-event-publisher';
export { captureException, flushSentry } from './infrastructure/sentry';
export * from './integrations/strava';
export * from './integrations/discord';
export * from './formatting';
