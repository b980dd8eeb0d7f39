// functions/src/crews/inviteToCrew.ts

import * as functions from 'firebase-functions/v2';
import { CallableRequest } from 'firebase-functions/v2/https';
import * as admin from 'firebase-admin';
import { canInviteMembers, readCrew, timestampMillis } from '../utils/crewRecords';
import { getInvitationTtlDays, getMaxCrewMembers } from '../utils/config';

const MAX_INVITATION_MESSAGE_LENGTH = 500;
const DAY_MS = 24 * 60 * 60 * 1000;

interface InviteToCrewData {
  crewId?: unknown;
  inviteeId?: unknown;
  message?: unknown;
}

interface InviteToCrewResponse {
  invitationId: string;
}

/**
 * Creates a pending invitation for a user to join a crew.
 * @param {InviteToCrewData} data The callable payload
 * @param {string|undefined} callerId The authenticated caller
 * @return {Promise<InviteToCrewResponse>} The new invitation id
 */
export async function handleInviteToCrew(
  data: InviteToCrewData,
  callerId: string | undefined
): Promise<InviteToCrewResponse> {
  if (!callerId) {
    throw new functions.https.HttpsError(
      'unauthenticated',
      'The function must be called while authenticated.'
    );
  }

  const { crewId, inviteeId, message } = data;
  if (typeof crewId !== 'string' || !crewId || typeof inviteeId !== 'string' || !inviteeId) {
    throw new functions.https.HttpsError(
      'invalid-argument',
      'The function must be called with crewId and inviteeId.'
    );
  }
  let trimmedMessage = '';
  if (message !== undefined) {
    if (typeof message !== 'string') {
      throw new functions.https.HttpsError('invalid-argument', 'Invitation message must be text.');
    }
    trimmedMessage = message.trim();
  }
  if (trimmedMessage.length > MAX_INVITATION_MESSAGE_LENGTH) {
    throw new functions.https.HttpsError(
      'invalid-argument',
      `Invitation message must be less than ${MAX_INVITATION_MESSAGE_LENGTH} characters.`
    );
  }
  if (inviteeId === callerId) {
    throw new functions.https.HttpsError('invalid-argument', 'You cannot invite yourself.');
  }

  const db = admin.firestore();

  try {
    const crewDoc = await db.collection('crews').doc(crewId).get();
    const crewData = crewDoc.data();
    if (!crewDoc.exists || !crewData) {
      throw new functions.https.HttpsError('not-found', 'Crew not found.');
    }
    const crew = readCrew(crewData);
    if (!crew.isActive) {
      throw new functions.https.HttpsError('failed-precondition', 'This crew is no longer active.');
    }

    if (!canInviteMembers(crew, callerId)) {
      throw new functions.https.HttpsError(
        'permission-denied',
        'You do not have permission to invite members to this crew.'
      );
    }

    const inviteeDoc = await db.collection('users').doc(inviteeId).get();
    if (!inviteeDoc.exists) {
      throw new functions.https.HttpsError('not-found', 'User not found.');
    }

    if (crew.memberIds.includes(inviteeId)) {
      throw new functions.https.HttpsError('already-exists', 'User is already a member of this crew.');
    }

    const capacity = Math.min(crew.maxMembers, getMaxCrewMembers());
    if (crew.memberIds.length >= capacity) {
      throw new functions.https.HttpsError('resource-exhausted', 'This crew is full.');
    }

    const nowMillis = admin.firestore.Timestamp.now().toMillis();
    const pendingSnapshot = await db
      .collection('crewInvitations')
      .where('crewId', '==', crewId)
      .where('inviteeId', '==', inviteeId)
      .where('status', '==', 'pending')
      .get();
    const hasLiveInvitation = pendingSnapshot.docs.some((doc) => {
      const expiresAt = timestampMillis(doc.data().expiresAt);
      return expiresAt === null || expiresAt > nowMillis;
    });
    if (hasLiveInvitation) {
      throw new functions.https.HttpsError(
        'already-exists',
        'An invitation is already pending for this user.'
      );
    }

    const invitationRef = await db.collection('crewInvitations').add({
      crewId,
      crewName: crew.name,
      inviterId: callerId,
      inviteeId,
      ...(trimmedMessage ? { message: trimmedMessage } : {}),
      status: 'pending',
      createdAt: admin.firestore.FieldValue.serverTimestamp(),
      expiresAt: admin.firestore.Timestamp.fromMillis(nowMillis + getInvitationTtlDays() * DAY_MS),
    });

    console.log(`User ${callerId} invited ${inviteeId} to crew ${crewId}`);
    return { invitationId: invitationRef.id };
  } catch (error) {
    console.error('Error in inviteToCrew function:', error);
    if (error instanceof functions.https.HttpsError) {
      throw error;
    }
    throw new functions.https.HttpsError('unknown', 'An unknown error occurred.');
  }
}

export const inviteToCrew = functions.https.onCall(
  (request: CallableRequest<InviteToCrewData>): Promise<InviteToCrewResponse> =>
    handleInviteToCrew(request.data, request.auth?.uid)
);
