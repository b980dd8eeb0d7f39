// functions/src/crews/respondToInvitation.ts

import * as functions from 'firebase-functions/v2';
import { CallableRequest } from 'firebase-functions/v2/https';
import * as admin from 'firebase-admin';
import { asString, readCrew, timestampMillis } from '../utils/crewRecords';
import { getMaxCrewMembers } from '../utils/config';

interface RespondToInvitationData {
  invitationId?: unknown;
  accept?: unknown;
}

type InvitationOutcome = 'accepted' | 'declined' | 'expired';

interface RespondToInvitationResponse {
  crewId: string;
  status: InvitationOutcome;
}

/**
 * Accepts or declines a crew invitation on behalf of the invitee. Accepting
 * adds the invitee to the crew inside the same transaction that closes the
 * invitation.
 * @param {RespondToInvitationData} data The callable payload
 * @param {string|undefined} callerId The authenticated caller
 * @return {Promise<RespondToInvitationResponse>} The crew and the invitation's new status
 */
export async function handleRespondToInvitation(
  data: RespondToInvitationData,
  callerId: string | undefined
): Promise<RespondToInvitationResponse> {
  if (!callerId) {
    throw new functions.https.HttpsError(
      'unauthenticated',
      'The function must be called while authenticated.'
    );
  }

  const { invitationId, accept } = data;
  if (typeof invitationId !== 'string' || !invitationId || typeof accept !== 'boolean') {
    throw new functions.https.HttpsError(
      'invalid-argument',
      'The function must be called with invitationId and accept.'
    );
  }

  const db = admin.firestore();
  const invitationRef = db.collection('crewInvitations').doc(invitationId);

  try {
    const result = await db.runTransaction(async (transaction): Promise<RespondToInvitationResponse> => {
      const invitationDoc = await transaction.get(invitationRef);
      const invitation = invitationDoc.data();
      if (!invitationDoc.exists || !invitation) {
        throw new functions.https.HttpsError('not-found', 'Invitation not found.');
      }
      if (invitation.inviteeId !== callerId) {
        throw new functions.https.HttpsError(
          'permission-denied',
          'Only the invited user can respond to this invitation.'
        );
      }
      if (invitation.status !== 'pending') {
        throw new functions.https.HttpsError('failed-precondition', 'This invitation is no longer pending.');
      }

      const crewId = asString(invitation.crewId);
      const respondedAt = admin.firestore.FieldValue.serverTimestamp();
      const expiresAt = timestampMillis(invitation.expiresAt);

      if (expiresAt !== null && expiresAt <= admin.firestore.Timestamp.now().toMillis()) {
        transaction.update(invitationRef, { status: 'expired' });
        return { crewId, status: 'expired' };
      }

      if (!accept) {
        transaction.update(invitationRef, { status: 'declined', respondedAt });
        return { crewId, status: 'declined' };
      }

      const crewRef = db.collection('crews').doc(crewId);
      const crewDoc = await transaction.get(crewRef);
      const crewData = crewDoc.data();
      if (!crewDoc.exists || !crewData) {
        throw new functions.https.HttpsError('not-found', 'Crew not found.');
      }
      const crew = readCrew(crewData);
      if (!crew.isActive) {
        throw new functions.https.HttpsError('failed-precondition', 'This crew is no longer active.');
      }

      if (!crew.memberIds.includes(callerId)) {
        const capacity = Math.min(crew.maxMembers, getMaxCrewMembers());
        if (crew.memberIds.length >= capacity) {
          throw new functions.https.HttpsError('resource-exhausted', 'This crew is full.');
        }
        transaction.update(crewRef, {
          memberIds: admin.firestore.FieldValue.arrayUnion(callerId),
          [`roles.${callerId}`]: 'member',
          updatedAt: respondedAt,
        });
        transaction.set(
          db.collection('users').doc(callerId),
          { crewIds: admin.firestore.FieldValue.arrayUnion(crewId) },
          { merge: true }
        );
      }
      transaction.update(invitationRef, { status: 'accepted', respondedAt });
      return { crewId, status: 'accepted' };
    });

    if (result.status === 'expired') {
      throw new functions.https.HttpsError('failed-precondition', 'This invitation has expired.');
    }

    console.log(`User ${callerId} ${result.status} invitation ${invitationId}`);
    return result;
  } catch (error) {
    console.error('Error in respondToInvitation function:', error);
    if (error instanceof functions.https.HttpsError) {
      throw error;
    }
    throw new functions.https.HttpsError('unknown', 'An unknown error occurred.');
  }
}

export const respondToInvitation = functions.https.onCall(
  (request: CallableRequest<RespondToInvitationData>): Promise<RespondToInvitationResponse> =>
    handleRespondToInvitation(request.data, request.auth?.uid)
);
