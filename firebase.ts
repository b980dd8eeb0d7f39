// firebase.ts
import { initializeApp } from 'firebase/app';
import { getAuth } from 'firebase/auth';
import { getFirestore } from 'firebase/firestore';
import { getFunctions } from 'firebase/functions';
import { loadConfig } from './config';

const config = loadConfig();

export const app = initializeApp(config.firebase);
export const db = getFirestore(app);
export const auth = getAuth(app);
export const functions = getFunctions(app, config.functionsRegion);
