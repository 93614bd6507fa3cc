export const TOPICS = {
  ACTIVITY_EVENTS: process.env.ACTIVITY_TOPIC || 'strava-activities',
};

export const COLLECTIONS = {
  USERS: process.env.USERS_COLLECTION || 'strava_users',
  MESSAGES: process.env.MESSAGES_COLLECTION || 'strava_messages',
};

export const STRAVA_API_BASE = 'https://www.strava.com/api/v3';
export const STRAVA_OAUTH_BASE = 'https://www.strava.com/oauth';

// Scopes requested on the authorize redirect; activity:read is the minimum needed to fetch activities.
export const STRAVA_SCOPES = 'read,activity:read_all';

export const CLOUD_EVENT_SOURCE = '/strava/webhook';
export const CLOUD_EVENT_TYPES = {
  ACTIVITY_CREATED: 'strava.activity.created',
};
