export { getSecret, getOptionalSecret, toSecretId } from './manager';
