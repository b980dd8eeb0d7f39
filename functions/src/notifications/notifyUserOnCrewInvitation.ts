import { onDocumentCreated } from 'firebase-functions/v2/firestore';
import * as admin from 'firebase-admin';
import { sendExpoNotifications } from '../utils/sendExpoNotifications';
import { shouldSendNotification } from '../utils/notificationSettings';
import { asString, getDisplayName, getPushToken } from '../utils/crewRecords';

/**
 * Push a pending invitation to the invitee.
 * @param {string} invitationId The invitation id
 * @param {admin.firestore.DocumentData} invitation The invitation document
 * @return {Promise<boolean>} Whether a notification was sent
 */
export async function handleCrewInvitationCreated(
  invitationId: string,
  invitation: admin.firestore.DocumentData
): Promise<boolean> {
  const db = admin.firestore();

  if (invitation.status !== 'pending') {
    return false;
  }
  const inviteeId = asString(invitation.inviteeId);
  const inviterId = asString(invitation.inviterId);
  const crewId = asString(invitation.crewId);
  if (!inviteeId || !crewId) {
    console.log(`Invitation ${invitationId} is missing inviteeId or crewId.`);
    return false;
  }

  const inviteeDoc = await db.collection('users').doc(inviteeId).get();
  const inviteeData = inviteeDoc.data();
  if (!inviteeDoc.exists || !inviteeData) {
    console.log(`Invitee ${inviteeId} does not exist.`);
    return false;
  }

  const pushToken = getPushToken(inviteeData);
  if (!pushToken) {
    console.log(`User ${inviteeId} does not have a valid pushToken. Skipping notification.`);
    return false;
  }
  if (!shouldSendNotification(inviteeData.notificationSettings, 'crew_invitation')) {
    console.log(`User ${inviteeId} has disabled crew_invitation notifications. Skipping.`);
    return false;
  }

  const inviterDoc = inviterId ? await db.collection('users').doc(inviterId).get() : null;
  const inviterName = getDisplayName(inviterDoc?.data(), 'Someone');
  const crewName = asString(invitation.crewName, 'a crew');

  await sendExpoNotifications([{
    to: pushToken,
    sound: 'default',
    title: 'Crew invitation',
    body: `${inviterName} invited you to join ${crewName}`,
    data: {
      screen: 'CrewInvitations',
      invitationId,
      crewId,
    },
  }]);
  console.log(`Sent crew invitation notification to user ${inviteeId}`);
  return true;
}

export const notifyUserOnCrewInvitation = onDocumentCreated(
  'crewInvitations/{invitationId}',
  async (event) => {
    if (!event.data) {
      console.log('Event data is undefined.');
      return null;
    }

    try {
      await handleCrewInvitationCreated(event.params.invitationId, event.data.data());
    } catch (error) {
      console.error('Error sending crew invitation notification:', error);
    }
    return null;
  }
);
