export * from './relay';
export * from './strava';
