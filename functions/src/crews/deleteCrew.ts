// functions/src/crews/deleteCrew.ts

import * as functions from 'firebase-functions/v2';
import { CallableRequest } from 'firebase-functions/v2/https';
import * as admin from 'firebase-admin';
import { ExpoPushMessage } from 'expo-server-sdk';
import {
  BatchWrite,
  canDeleteCrew,
  commitInBatches,
  fetchUsersByIds,
  getPushToken,
  readCrew,
} from '../utils/crewRecords';
import { shouldSendNotification } from '../utils/notificationSettings';
import { sendExpoNotifications } from '../utils/sendExpoNotifications';

interface DeleteCrewData {
  crewId?: unknown;
}

interface DeleteCrewResponse {
  success: boolean;
}

/**
 * Disbands a crew: detaches it from every member, cancels its pending
 * invitations, deletes the crew with all of its subcollections and tells the
 * other members.
 * @param {DeleteCrewData} data The callable payload
 * @param {string|undefined} callerId The authenticated caller
 * @return {Promise<DeleteCrewResponse>} Success flag
 */
export async function handleDeleteCrew(
  data: DeleteCrewData,
  callerId: string | undefined
): Promise<DeleteCrewResponse> {
  if (!callerId) {
    throw new functions.https.HttpsError(
      'unauthenticated',
      'The function must be called while authenticated.'
    );
  }

  const { crewId } = data;
  if (typeof crewId !== 'string' || !crewId) {
    throw new functions.https.HttpsError('invalid-argument', 'The function must be called with crewId.');
  }

  const db = admin.firestore();

  try {
    const crewRef = db.collection('crews').doc(crewId);
    const crewDoc = await crewRef.get();
    const crewData = crewDoc.data();
    if (!crewDoc.exists || !crewData) {
      throw new functions.https.HttpsError('not-found', 'Crew not found.');
    }
    const crew = readCrew(crewData);

    if (!canDeleteCrew(crew, callerId)) {
      throw new functions.https.HttpsError(
        'permission-denied',
        'Only the crew foreman can delete this crew.'
      );
    }

    const memberDocs = await fetchUsersByIds(db, crew.memberIds);

    const writes: BatchWrite[] = crew.memberIds.map((memberId): BatchWrite => (batch) => {
      batch.set(
        db.collection('users').doc(memberId),
        { crewIds: admin.firestore.FieldValue.arrayRemove(crewId) },
        { merge: true }
      );
    });
    const pendingInvitations = await db
      .collection('crewInvitations')
      .where('crewId', '==', crewId)
      .where('status', '==', 'pending')
      .get();
    pendingInvitations.docs.forEach((doc) => {
      writes.push((batch) => {
        batch.update(doc.ref, { status: 'cancelled' });
      });
    });
    await commitInBatches(db, writes);

    await db.recursiveDelete(crewRef);
    console.log(`Crew ${crewId} deleted by ${callerId}`);

    const notifications: ExpoPushMessage[] = [];
    memberDocs
      .filter((doc) => doc.id !== callerId)
      .forEach((doc) => {
        const userData = doc.data();
        const pushToken = getPushToken(userData);
        if (!pushToken || !shouldSendNotification(userData.notificationSettings, 'crew_disbanded')) {
          return;
        }
        notifications.push({
          to: pushToken,
          sound: 'default',
          title: crew.name,
          body: `${crew.name} has been disbanded`,
          data: { screen: 'Crews' },
        });
      });
    if (notifications.length > 0) {
      await sendExpoNotifications(notifications);
    }

    return { success: true };
  } catch (error) {
    console.error('Error in deleteCrew function:', error);
    if (error instanceof functions.https.HttpsError) {
      throw error;
    }
    throw new functions.https.HttpsError('unknown', 'An unknown error occurred.');
  }
}

export const deleteCrew = functions.https.onCall(
  (request: CallableRequest<DeleteCrewData>): Promise<DeleteCrewResponse> =>
    handleDeleteCrew(request.data, request.auth?.uid)
);
