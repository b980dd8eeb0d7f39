// functions/src/crews/cancelInvitation.ts

import * as functions from 'firebase-functions/v2';
import { CallableRequest } from 'firebase-functions/v2/https';
import * as admin from 'firebase-admin';

interface CancelInvitationData {
  invitationId?: unknown;
}

interface CancelInvitationResponse {
  success: boolean;
}

/**
 * Withdraws a pending invitation. Only the user who sent it can cancel it.
 * @param {CancelInvitationData} data The callable payload
 * @param {string|undefined} callerId The authenticated caller
 * @return {Promise<CancelInvitationResponse>} Success flag
 */
export async function handleCancelInvitation(
  data: CancelInvitationData,
  callerId: string | undefined
): Promise<CancelInvitationResponse> {
  if (!callerId) {
    throw new functions.https.HttpsError(
      'unauthenticated',
      'The function must be called while authenticated.'
    );
  }

  const { invitationId } = data;
  if (typeof invitationId !== 'string' || !invitationId) {
    throw new functions.https.HttpsError('invalid-argument', 'The function must be called with invitationId.');
  }

  const db = admin.firestore();
  const invitationRef = db.collection('crewInvitations').doc(invitationId);

  try {
    await db.runTransaction(async (transaction) => {
      const invitationDoc = await transaction.get(invitationRef);
      const invitation = invitationDoc.data();
      if (!invitationDoc.exists || !invitation) {
        throw new functions.https.HttpsError('not-found', 'Invitation not found.');
      }
      if (invitation.inviterId !== callerId) {
        throw new functions.https.HttpsError(
          'permission-denied',
          'Only the user who sent this invitation can cancel it.'
        );
      }
      if (invitation.status !== 'pending') {
        throw new functions.https.HttpsError('failed-precondition', 'This invitation is no longer pending.');
      }
      transaction.update(invitationRef, {
        status: 'cancelled',
        respondedAt: admin.firestore.FieldValue.serverTimestamp(),
      });
    });

    console.log(`User ${callerId} cancelled invitation ${invitationId}`);
    return { success: true };
  } catch (error) {
    console.error('Error in cancelInvitation function:', error);
    if (error instanceof functions.https.HttpsError) {
      throw error;
    }
    throw new functions.https.HttpsError('unknown', 'An unknown error occurred.');
  }
}

export const cancelInvitation = functions.https.onCall(
  (request: CallableRequest<CancelInvitationData>): Promise<CancelInvitationResponse> =>
    handleCancelInvitation(request.data, request.auth?.uid)
);
