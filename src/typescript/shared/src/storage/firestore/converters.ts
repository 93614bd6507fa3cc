import { FirestoreDataConverter, QueryDocumentSnapshot, Timestamp } from 'firebase-admin/firestore';
import { UserToken, SeenMessage } from '../../types/relay';

// Helper to convert Firestore Timestamp to Date
export const toDate = (val: unknown): Date | undefined => {
  if (val === undefined || val === null) return undefined;
  if (val instanceof Timestamp) return val.toDate();
  if (val instanceof Date) return val;
  if (typeof val === 'string' || typeof val === 'number') return new Date(val);
  return undefined;
};

export const userTokenConverter: FirestoreDataConverter<UserToken> = {
  toFirestore(model: UserToken): FirebaseFirestore.DocumentData {
    const data: FirebaseFirestore.DocumentData = {
      user_id: model.userId,
      access_token: model.accessToken,
      refresh_token: model.refreshToken,
      expires_at: model.expiresAt,
    };
    if (model.updatedAt !== undefined) data.updated_at = model.updatedAt;
    return data;
  },
  fromFirestore(snapshot: QueryDocumentSnapshot): UserToken {
    const data = snapshot.data();
    return {
      userId: Number(data.user_id ?? snapshot.id),
      accessToken: String(data.access_token ?? ''),
      refreshToken: String(data.refresh_token ?? ''),
      // A missing expiry reads as already expired so the next use refreshes it
      expiresAt: toDate(data.expires_at) ?? new Date(0),
      updatedAt: toDate(data.updated_at),
    };
  }
};

export const seenMessageConverter: FirestoreDataConverter<SeenMessage> = {
  toFirestore(model: SeenMessage): FirebaseFirestore.DocumentData {
    return {
      activity_id: model.activityId,
      received_at: model.receivedAt,
    };
  },
  fromFirestore(snapshot: QueryDocumentSnapshot): SeenMessage {
    const data = snapshot.data();
    return {
      activityId: Number(data.activity_id ?? snapshot.id),
      receivedAt: toDate(data.received_at) ?? new Date(0),
    };
  }
};
