/**
 * Error taxonomy shared by the relay handlers.
 *
 * A duplicate webhook delivery is not represented here: the receiver
 * short-circuits on it without raising.
 */

/**
 * The upstream rejected our credentials, or a refresh could not produce new ones.
 */
export class AuthenticationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AuthenticationError';
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

/**
 * Strava answered with a non-2xx status (other than an auth failure) or an unparseable body.
 */
export class UpstreamUnavailableError extends Error {
  public readonly status?: number;
  /** Excerpt of the error body, when Strava sent one. */
  public readonly body?: string;

  constructor(message: string, status?: number, options?: { cause?: unknown; body?: string }) {
    super(message, options);
    this.name = 'UpstreamUnavailableError';
    this.status = status;
    this.body = options?.body;
    Object.setPrototypeOf(this, UpstreamUnavailableError.prototype);
  }
}

/**
 * A Firestore read or write failed. Fatal for the invocation.
 */
export class StorageError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageError';
    Object.setPrototypeOf(this, StorageError.prototype);
  }
}

export class MissingTokenError extends Error {
  public readonly userId: number;

  constructor(userId: number) {
    super(`No stored token for athlete ${userId}`);
    this.name = 'MissingTokenError';
    this.userId = userId;
    Object.setPrototypeOf(this, MissingTokenError.prototype);
  }
}

/**
 * The authorization code could not be exchanged. Codes are single use, so a replayed
 * callback ends here too.
 */
export class TokenExchangeError extends Error {
  public readonly status: number;
  public readonly body: string;

  constructor(status: number, body: string) {
    super(`Token exchange failed: ${status}`);
    this.name = 'TokenExchangeError';
    this.status = status;
    this.body = body;
    Object.setPrototypeOf(this, TokenExchangeError.prototype);
  }
}

/**
 * The chat webhook refused the message.
 */
export class DeliveryError extends Error {
  public readonly status: number;

  constructor(message: string, status: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DeliveryError';
    this.status = status;
    Object.setPrototypeOf(this, DeliveryError.prototype);
  }
}
