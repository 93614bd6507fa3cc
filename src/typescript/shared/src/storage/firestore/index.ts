// Only export stores - converters are internal to the storage layer
export { UserTokenStore } from './user-token-store';
export { SeenMessageStore } from './seen-message-store';
