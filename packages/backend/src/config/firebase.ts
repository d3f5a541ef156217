import * as admin from 'firebase-admin';
import type { Firestore } from 'firebase-admin/firestore';
import type { Settings } from './settings';

const initializeFirebase = (settings: Settings) => {
  const { projectId, privateKey, clientEmail } = settings.firebase;
  if (settings.nodeEnv === 'production' && privateKey && clientEmail) {
    admin.initializeApp({
      credential: admin.credential.cert({ projectId, privateKey, clientEmail }),
    });
    console.log('Firebase initialized with service account');
  } else {
    // Local development runs against the emulator
    admin.initializeApp({ projectId });
    console.log('Firebase initialized for local development with emulator');
  }
};

export function connectFirestore(settings: Settings): Firestore {
  if (admin.apps.length === 0) initializeFirebase(settings);

  const db = admin.firestore();
  if (settings.nodeEnv !== 'production') {
    db.settings({ host: settings.firebase.emulatorHost, ssl: false, ignoreUndefinedProperties: true });
    console.log(`Connected to Firestore emulator at ${settings.firebase.emulatorHost}`);
  } else {
    db.settings({ ignoreUndefinedProperties: true });
  }
  return db;
}
