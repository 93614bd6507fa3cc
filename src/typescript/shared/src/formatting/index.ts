export * from './activity-embed';
