import * as admin from 'firebase-admin';
import { Expo } from 'expo-server-sdk';

export type MemberRole = 'admin' | 'foreman' | 'lead' | 'member';

const MEMBER_ROLES: readonly MemberRole[] = ['admin', 'foreman', 'lead', 'member'];
const INVITING_ROLES: readonly MemberRole[] = ['admin', 'foreman', 'lead'];

export interface CrewRecord {
  name: string;
  foremanId: string;
  memberIds: string[];
  roles: Record<string, MemberRole>;
  maxMembers: number;
  isActive: boolean;
}

export const asString = (value: unknown, fallback = ''): string =>
  typeof value === 'string' ? value : fallback;

export const asStringArray = (value: unknown): string[] =>
  Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];

/**
 * Reads a crew document into the fields the functions rely on.
 * @param {admin.firestore.DocumentData} data The crew document data
 * @return {CrewRecord} The crew record
 */
export function readCrew(data: admin.firestore.DocumentData): CrewRecord {
  const roles: Record<string, MemberRole> = {};
  const rawRoles: unknown = data.roles;
  if (typeof rawRoles === 'object' && rawRoles !== null) {
    for (const [uid, role] of Object.entries(rawRoles)) {
      const match = MEMBER_ROLES.find((candidate) => candidate === role);
      if (match) roles[uid] = match;
    }
  }
  return {
    name: asString(data.name, 'Your Crew'),
    foremanId: asString(data.foremanId),
    memberIds: asStringArray(data.memberIds),
    roles,
    maxMembers: typeof data.maxMembers === 'number' ? data.maxMembers : 10,
    isActive: data.isActive !== false,
  };
}

/**
 * Resolves a user's role in a crew, or null when they are not a member.
 * @param {CrewRecord} crew The crew
 * @param {string} uid The user
 * @return {MemberRole|null} The role
 */
export function getMemberRole(crew: CrewRecord, uid: string): MemberRole | null {
  if (!crew.memberIds.includes(uid) && crew.foremanId !== uid) {
    return null;
  }
  return crew.roles[uid] || (crew.foremanId === uid ? 'foreman' : 'member');
}

export const canInviteMembers = (crew: CrewRecord, uid: string): boolean => {
  const role = getMemberRole(crew, uid);
  return role !== null && INVITING_ROLES.includes(role);
};

export const canDeleteCrew = (crew: CrewRecord, uid: string): boolean =>
  crew.foremanId === uid || getMemberRole(crew, uid) === 'admin';

/**
 * Fetches user documents by id. Firestore 'in' queries are limited to 10 values.
 * @param {admin.firestore.Firestore} db Firestore instance
 * @param {string[]} userIds The user ids to fetch
 * @return {Promise<admin.firestore.QueryDocumentSnapshot[]>} The user documents that exist
 */
export async function fetchUsersByIds(
  db: admin.firestore.Firestore,
  userIds: string[]
): Promise<admin.firestore.QueryDocumentSnapshot[]> {
  const batchSize = 10;
  const userDocs: admin.firestore.QueryDocumentSnapshot[] = [];

  for (let i = 0; i < userIds.length; i += batchSize) {
    const batch = userIds.slice(i, i + batchSize);
    const usersSnapshot = await db
      .collection('users')
      .where(admin.firestore.FieldPath.documentId(), 'in', batch)
      .get();
    usersSnapshot.docs.forEach((doc) => userDocs.push(doc));
  }

  return userDocs;
}

/**
 * The user's Expo push token when it is a valid one.
 * @param {admin.firestore.DocumentData} userData The user document data
 * @return {string|null} The token
 */
export function getPushToken(userData: admin.firestore.DocumentData): string | null {
  const token: unknown = userData.expoPushToken;
  return typeof token === 'string' && Expo.isExpoPushToken(token) ? token : null;
}

export const getDisplayName = (userData: admin.firestore.DocumentData | undefined, fallback: string): string =>
  asString(userData?.displayName) || fallback;

/**
 * Millisecond value of a stored Firestore timestamp.
 * @param {unknown} value The field value
 * @return {number|null} Milliseconds since epoch, or null for anything else
 */
export function timestampMillis(value: unknown): number | null {
  return value instanceof admin.firestore.Timestamp ? value.toMillis() : null;
}

// Firestore batches take at most 500 writes
export const BATCH_LIMIT = 500;

export type BatchWrite = (batch: admin.firestore.WriteBatch) => void;

/**
 * Commits the writes in consecutive batches of at most BATCH_LIMIT.
 * @param {admin.firestore.Firestore} db The Firestore instance
 * @param {BatchWrite[]} writes One callback per document write
 * @return {Promise<void>}
 */
export async function commitInBatches(
  db: admin.firestore.Firestore,
  writes: BatchWrite[]
): Promise<void> {
  for (let i = 0; i < writes.length; i += BATCH_LIMIT) {
    const batch = db.batch();
    writes.slice(i, i + BATCH_LIMIT).forEach((write) => write(batch));
    await batch.commit();
  }
}
