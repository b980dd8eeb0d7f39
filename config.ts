// config.ts
import dotenv from 'dotenv';

dotenv.config();

export interface FirebaseWebConfig {
  apiKey: string;
  authDomain: string;
  projectId: string;
  storageBucket: string;
  messagingSenderId: string;
  appId: string;
}

export interface AppConfig {
  firebase: FirebaseWebConfig;
  functionsRegion: string;
}

export const DEFAULT_FUNCTIONS_REGION = 'us-central1';

type Env = Record<string, string | undefined>;

const required = (env: Env, key: string): string => {
  const value = env[key]?.trim();
  if (!value) {
    throw new Error(`Missing required environment variable ${key}`);
  }
  return value;
};

/**
 * Build the app configuration from environment variables. Throws on the
 * first missing Firebase key.
 */
export const loadConfig = (env: Env = process.env): AppConfig => ({
  firebase: {
    apiKey: required(env, 'FIREBASE_API_KEY'),
    authDomain: required(env, 'FIREBASE_AUTH_DOMAIN'),
    projectId: required(env, 'FIREBASE_PROJECT_ID'),
    storageBucket: required(env, 'FIREBASE_STORAGE_BUCKET'),
    messagingSenderId: required(env, 'FIREBASE_MESSAGING_SENDER_ID'),
    appId: required(env, 'FIREBASE_APP_ID'),
  },
  functionsRegion: env.FIREBASE_FUNCTIONS_REGION?.trim() || DEFAULT_FUNCTIONS_REGION,
});
