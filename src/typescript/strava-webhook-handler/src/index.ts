import { createCloudFunction, FrameworkContext, FrameworkRequest, FrameworkResponse } from '@strava-reporter/shared';
import { verifySubscription } from './verification';
import { receiveEvent } from './receiver';

export const handler = async (req: FrameworkRequest, ctx: FrameworkContext) => {
  switch (req.method) {
    case 'GET':
      return verifySubscription(req, ctx);
    case 'POST':
      return receiveEvent(req, ctx);
    default:
      return new FrameworkResponse({ status: 405, headers: { Allow: 'GET, POST' } });
  }
};

export const stravaWebhookHandler = createCloudFunction(handler, { component: 'strava-webhook' });
