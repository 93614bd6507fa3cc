import * as admin from 'firebase-admin';
import * as converters from './converters';
import { COLLECTIONS } from '../../config';
import { StorageError } from '../../errors';

// gRPC status returned by create() when the document already exists
const ALREADY_EXISTS = 6;

function isAlreadyExists(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === ALREADY_EXISTS;
}

/**
 * SeenMessageStore records which activity ids have already been relayed.
 */
export class SeenMessageStore {
  constructor(private db: admin.firestore.Firestore, private collectionName: string = COLLECTIONS.MESSAGES) { }

  private collection() {
    return this.db.collection(this.collectionName).withConverter(converters.seenMessageConverter);
  }

  /**
   * Insert the marker for an activity unless one exists.
   * Uses create(), which the server rejects when the document exists, so concurrent
   * deliveries of the same id cannot both win.
   *
   * @returns true if this call created the marker, false if it was already there
   */
  async recordIfAbsent(activityId: number, receivedAt: Date = new Date()): Promise<boolean> {
    try {
      await this.collection().doc(String(activityId)).create({ activityId, receivedAt });
      return true;
    } catch (err) {
      if (isAlreadyExists(err)) {
        return false;
      }
      throw new StorageError(`Failed to record activity ${activityId}`, { cause: err });
    }
  }
}
