import { z } from 'zod';

/**
 * Strava Webhook Event payload structure
 * https://developers.strava.com/docs/webhooks/
 */
export const stravaWebhookEventSchema = z.object({
  object_type: z.enum(['activity', 'athlete']),
  object_id: z.number().int(),
  aspect_type: z.enum(['create', 'update', 'delete']),
  owner_id: z.number().int(),
  subscription_id: z.number().int().optional(),
  event_time: z.number().int().optional(),
  updates: z.record(z.union([z.string(), z.number(), z.boolean()])).optional(),
});

export type StravaWebhookEvent = z.infer<typeof stravaWebhookEventSchema>;

export const stravaActivitySchema = z.object({
  id: z.number().int(),
  name: z.string(),
  type: z.string(),
  sport_type: z.string().optional(),
  distance: z.number(),
  moving_time: z.number(),
  elapsed_time: z.number(),
  total_elevation_gain: z.number().default(0),
  average_speed: z.number().default(0),
  start_date: z.string().datetime(),
});

export type StravaActivity = z.infer<typeof stravaActivitySchema>;

export const stravaAthleteSchema = z.object({
  id: z.number().int(),
  firstname: z.string().nullable().optional(),
  lastname: z.string().nullable().optional(),
  profile_medium: z.string().nullable().optional(),
});

export type StravaAthlete = z.infer<typeof stravaAthleteSchema>;

/**
 * Response of POST /oauth/token for both grant types. The athlete summary is only
 * present for authorization_code.
 */
export const stravaTokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1),
  expires_at: z.number().int(),
  athlete: stravaAthleteSchema.optional(),
});

export type StravaTokenResponse = z.infer<typeof stravaTokenResponseSchema>;

export const pushSubscriptionSchema = z.object({
  id: z.number().int(),
  callback_url: z.string(),
  created_at: z.string().optional(),
  updated_at: z.string().optional(),
});

export type PushSubscription = z.infer<typeof pushSubscriptionSchema>;
