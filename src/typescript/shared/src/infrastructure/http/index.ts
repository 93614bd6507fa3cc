export { MAX_ERROR_BODY_SIZE, excerpt, stravaFailure, discordFailure } from './failures';
