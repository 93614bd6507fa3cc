import * as admin from 'firebase-admin';
import * as converters from './converters';
import { COLLECTIONS } from '../../config';
import { StorageError } from '../../errors';
import { UserToken } from '../../types/relay';

/**
 * UserTokenStore provides typed access to the per-athlete OAuth token table.
 * Every operation touches exactly one document.
 */
export class UserTokenStore {
  constructor(private db: admin.firestore.Firestore, private collectionName: string = COLLECTIONS.USERS) { }

  private collection() {
    return this.db.collection(this.collectionName).withConverter(converters.userTokenConverter);
  }

  /**
   * Get the token for an athlete, or null if they never authorized.
   */
  async get(userId: number): Promise<UserToken | null> {
    try {
      const doc = await this.collection().doc(String(userId)).get();
      return doc.exists ? doc.data() ?? null : null;
    } catch (err) {
      throw new StorageError(`Failed to read token for athlete ${userId}`, { cause: err });
    }
  }

  /**
   * Create or replace the token for an athlete.
   */
  async save(token: UserToken): Promise<void> {
    try {
      await this.collection().doc(String(token.userId)).set({
        ...token,
        updatedAt: token.updatedAt ?? new Date(),
      });
    } catch (err) {
      throw new StorageError(`Failed to save token for athlete ${token.userId}`, { cause: err });
    }
  }
}
