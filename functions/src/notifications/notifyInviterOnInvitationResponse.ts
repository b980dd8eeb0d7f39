import { onDocumentUpdated } from 'firebase-functions/v2/firestore';
import * as admin from 'firebase-admin';
import { sendExpoNotifications } from '../utils/sendExpoNotifications';
import { NotificationType, shouldSendNotification } from '../utils/notificationSettings';
import { asString, getDisplayName, getPushToken } from '../utils/crewRecords';

type InvitationResponse = 'accepted' | 'declined';

const RESPONSE_NOTIFICATION_TYPES: Record<InvitationResponse, NotificationType> = {
  accepted: 'crew_invitation_accepted',
  declined: 'crew_invitation_declined',
};

const readResponse = (status: unknown): InvitationResponse | null =>
  status === 'accepted' || status === 'declined' ? status : null;

/**
 * Tell the inviter that a pending invitation was accepted or declined.
 * @param {string} invitationId The invitation id
 * @param {admin.firestore.DocumentData} before The invitation before the update
 * @param {admin.firestore.DocumentData} after The invitation after the update
 * @return {Promise<boolean>} Whether a notification was sent
 */
export async function handleInvitationResponse(
  invitationId: string,
  before: admin.firestore.DocumentData,
  after: admin.firestore.DocumentData
): Promise<boolean> {
  const response = readResponse(after.status);
  if (before.status !== 'pending' || !response) {
    return false;
  }

  const inviterId = asString(after.inviterId);
  const inviteeId = asString(after.inviteeId);
  if (!inviterId) {
    console.log(`Invitation ${invitationId} has no inviter.`);
    return false;
  }

  const db = admin.firestore();
  const inviterDoc = await db.collection('users').doc(inviterId).get();
  const inviterData = inviterDoc.data();
  if (!inviterDoc.exists || !inviterData) {
    console.log(`Inviter ${inviterId} does not exist.`);
    return false;
  }

  const notificationType = RESPONSE_NOTIFICATION_TYPES[response];
  const pushToken = getPushToken(inviterData);
  if (!pushToken) {
    console.log(`User ${inviterId} does not have a valid pushToken. Skipping notification.`);
    return false;
  }
  if (!shouldSendNotification(inviterData.notificationSettings, notificationType)) {
    console.log(`User ${inviterId} has disabled ${notificationType} notifications. Skipping.`);
    return false;
  }

  const inviteeDoc = inviteeId ? await db.collection('users').doc(inviteeId).get() : null;
  const inviteeName = getDisplayName(inviteeDoc?.data(), 'Someone');
  const crewName = asString(after.crewName, 'your crew');
  const crewId = asString(after.crewId);

  await sendExpoNotifications([{
    to: pushToken,
    sound: 'default',
    title: response === 'accepted' ? 'Invitation accepted' : 'Invitation declined',
    body: response === 'accepted' ?
      `${inviteeName} joined ${crewName}` :
      `${inviteeName} declined your invitation to ${crewName}`,
    data: {
      screen: 'Crew',
      crewId,
      invitationId,
    },
  }]);
  console.log(`Sent invitation ${response} notification to user ${inviterId}`);
  return true;
}

export const notifyInviterOnInvitationResponse = onDocumentUpdated(
  'crewInvitations/{invitationId}',
  async (event) => {
    const before = event.data?.before.data();
    const after = event.data?.after.data();
    if (!before || !after) {
      console.log('Event data is undefined.');
      return null;
    }

    try {
      await handleInvitationResponse(event.params.invitationId, before, after);
    } catch (error) {
      console.error('Error sending invitation response notification:', error);
    }
    return null;
  }
);
