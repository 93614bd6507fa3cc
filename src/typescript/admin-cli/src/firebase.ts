import * as admin from 'firebase-admin';

let db: admin.firestore.Firestore | undefined;

// Initialized on first use so commands that only talk to Strava need no credentials
export function getAdminDb(): admin.firestore.Firestore {
  if (!db) {
    if (admin.apps.length === 0) {
      admin.initializeApp({
        credential: admin.credential.applicationDefault()
      });
    }
    db = admin.firestore();
  }
  return db;
}
