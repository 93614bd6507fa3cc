import { z } from 'zod';

/**
 * Stored OAuth credentials for one athlete, keyed by the Strava athlete id.
 */
export interface UserToken {
  userId: number;
  accessToken: string;
  refreshToken: string;
  expiresAt: Date;
  updatedAt?: Date;
}

/**
 * Marker that an activity id has been relayed. Its existence is the dedup check.
 */
export interface SeenMessage {
  activityId: number;
  receivedAt: Date;
}

export const relayEventSchema = z.object({
  user_id: z.number().int(),
  activity_id: z.number().int(),
  event_type: z.enum(['create', 'update', 'delete']),
});

/**
 * Payload carried on the activity topic: "this activity needs announcing".
 */
export type RelayEvent = z.infer<typeof relayEventSchema>;
