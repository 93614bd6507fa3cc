import { createCloudFunction, FrameworkContext, FrameworkRequest } from '@strava-reporter/shared';
import { postActivity } from './publisher';

export const handler = async (req: FrameworkRequest, ctx: FrameworkContext) => postActivity(req, ctx);

export const activityPostHandler = createCloudFunction(handler, { component: 'activity-post' });
