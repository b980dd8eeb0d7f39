import { onDocumentCreated } from 'firebase-functions/v2/firestore';
import * as admin from 'firebase-admin';
import { ExpoPushMessage } from 'expo-server-sdk';
import { sendExpoNotifications } from '../utils/sendExpoNotifications';
import { shouldSendNotification } from '../utils/notificationSettings';
import {
  asString,
  asStringArray,
  fetchUsersByIds,
  getDisplayName,
  getPushToken,
  readCrew,
  timestampMillis,
} from '../utils/crewRecords';

export const CHAT_METADATA_ID = 'metadata';

const CRITICAL_MESSAGE_TYPES = ['emergency', 'safetyAlert', 'weatherAlert'];

const describeMessage = (type: string, senderName: string, text: string): string => {
  switch (type) {
  case 'jobShare':
    return `${senderName} shared a job`;
  case 'location':
    return `${senderName} shared a location`;
  case 'image':
    return `${senderName} sent an image`;
  default:
    return `${senderName}: ${text}`;
  }
};

/**
 * Sends push notifications for a new crew chat message.
 *
 * Members are skipped when they have no valid push token, have turned the
 * category off, have already read past the message, or are online with the
 * chat open. Emergency, safety and weather alerts ignore the open-chat rule
 * and go out at high priority.
 *
 * @param {string} crewId The crew the message was posted in
 * @param {string} messageId The message document id
 * @param {admin.firestore.DocumentData} messageData The message document data
 * @return {Promise<number>} The number of notifications sent
 */
export async function handleNewCrewMessage(
  crewId: string,
  messageId: string,
  messageData: admin.firestore.DocumentData
): Promise<number> {
  const db = admin.firestore();

  // The read-state document lives in the same collection
  if (messageId === CHAT_METADATA_ID) {
    return 0;
  }

  const senderId = asString(messageData.senderId);
  const text = asString(messageData.text);
  const type = asString(messageData.type, 'text');

  if (!senderId || !text) {
    console.log('Missing senderId or text in message data.');
    return 0;
  }
  if (type === 'system') {
    return 0;
  }

  const isCritical = CRITICAL_MESSAGE_TYPES.includes(type);

  const senderDoc = await db.collection('users').doc(senderId).get();
  const senderName = getDisplayName(senderDoc.data(), asString(messageData.senderName) || 'Someone');

  const crewDoc = await db.collection('crews').doc(crewId).get();
  const crewData = crewDoc.data();
  if (!crewDoc.exists || !crewData) {
    console.log(`Crew ${crewId} does not exist.`);
    return 0;
  }
  const crew = readCrew(crewData);

  const recipientIds = crew.memberIds.filter((id) => id !== senderId);
  if (recipientIds.length === 0) {
    console.log('No recipients found for the crew message.');
    return 0;
  }

  const recipientDocs = await fetchUsersByIds(db, recipientIds);

  const metadataSnap = await db.collection('crews').doc(crewId).collection('messages').doc(CHAT_METADATA_ID).get();
  const lastRead: unknown = metadataSnap.data()?.lastRead;
  const lastReadTimestamps: Record<string, unknown> =
    typeof lastRead === 'object' && lastRead !== null ? Object.fromEntries(Object.entries(lastRead)) : {};

  const messageMillis = timestampMillis(messageData.createdAt) ?? admin.firestore.Timestamp.now().toMillis();
  const notificationType = isCritical ? 'crew_safety_alert' : 'crew_chat_message';

  const notifications: ExpoPushMessage[] = [];

  for (const doc of recipientDocs) {
    const userData = doc.data();
    const userId = doc.id;

    const pushToken = getPushToken(userData);
    if (!pushToken) {
      console.log(`User ${userId} does not have a valid pushToken. Skipping notification.`);
      continue;
    }

    if (!shouldSendNotification(userData.notificationSettings, notificationType)) {
      console.log(`User ${userId} has disabled ${notificationType} notifications. Skipping.`);
      continue;
    }

    const lastReadMillis = timestampMillis(lastReadTimestamps[userId]);
    if (lastReadMillis !== null && lastReadMillis > messageMillis) {
      continue;
    }

    const isActiveChat = asStringArray(userData.activeChats).includes(crewId);
    const isOnline = userData.isOnline === true;
    if (!isCritical && isActiveChat && isOnline) {
      console.log(`User ${userId} is actively viewing the chat and is online. No notification sent.`);
      continue;
    }

    notifications.push({
      to: pushToken,
      sound: 'default',
      title: isCritical ? `Safety alert: ${crew.name}` : crew.name,
      body: describeMessage(type, senderName, text),
      priority: isCritical ? 'high' : 'default',
      data: {
        screen: 'CrewChat',
        crewId,
        messageId,
        senderId,
      },
    });
  }

  if (notifications.length > 0) {
    await sendExpoNotifications(notifications);
    console.log(`Sent ${notifications.length} crew chat notifications for message in crew ${crewId}`);
  } else {
    console.log('No notifications to send.');
  }

  return notifications.length;
}

/**
 * Notify crew members when a new message is posted in a crew chat
 */
export const notifyCrewMembersOnNewMessage = onDocumentCreated(
  'crews/{crewId}/messages/{messageId}',
  async (event) => {
    if (!event.data) {
      console.log('Event data is undefined.');
      return null;
    }

    try {
      await handleNewCrewMessage(event.params.crewId, event.params.messageId, event.data.data());
    } catch (error) {
      console.error('Error sending crew chat notifications:', error);
    }
    return null;
  }
);
