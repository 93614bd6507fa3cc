export { StravaClient } from './client';
export { listPushSubscriptions, createPushSubscription, deletePushSubscription } from './push-subscriptions';
