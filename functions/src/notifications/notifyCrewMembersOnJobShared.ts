import { onDocumentCreated } from 'firebase-functions/v2/firestore';
import * as admin from 'firebase-admin';
import { ExpoPushMessage } from 'expo-server-sdk';
import { sendExpoNotifications } from '../utils/sendExpoNotifications';
import { shouldSendNotification } from '../utils/notificationSettings';
import { asString, fetchUsersByIds, getDisplayName, getPushToken, readCrew } from '../utils/crewRecords';

/**
 * Tells the rest of the crew when a member shares a job to the crew feed.
 * Feed rows added by matching or auto-share are not announced.
 * @param {string} crewId The crew
 * @param {string} feedId The job feed row id
 * @param {admin.firestore.DocumentData} feedData The job feed row
 * @return {Promise<number>} The number of notifications sent
 */
export async function handleJobShared(
  crewId: string,
  feedId: string,
  feedData: admin.firestore.DocumentData
): Promise<number> {
  const db = admin.firestore();

  if (feedData.source !== 'memberShare') {
    return 0;
  }
  const sharedBy = asString(feedData.sharedBy);
  if (!sharedBy) {
    console.log(`Job feed row ${feedId} has no sharedBy. Skipping.`);
    return 0;
  }

  const crewDoc = await db.collection('crews').doc(crewId).get();
  const crewData = crewDoc.data();
  if (!crewDoc.exists || !crewData) {
    console.log(`Crew ${crewId} does not exist.`);
    return 0;
  }
  const crew = readCrew(crewData);

  const recipientIds = crew.memberIds.filter((id) => id !== sharedBy);
  if (recipientIds.length === 0) {
    return 0;
  }

  const sharerDoc = await db.collection('users').doc(sharedBy).get();
  const sharerName = getDisplayName(sharerDoc.data(), 'A crew member');
  const jobTitle = asString(feedData.jobTitle, 'a job');
  const company = asString(feedData.company);
  const body = company ?
    `${sharerName} shared ${jobTitle} at ${company}` :
    `${sharerName} shared ${jobTitle}`;

  const notifications: ExpoPushMessage[] = [];
  const recipientDocs = await fetchUsersByIds(db, recipientIds);

  for (const doc of recipientDocs) {
    const userData = doc.data();
    const pushToken = getPushToken(userData);
    if (!pushToken) continue;
    if (!shouldSendNotification(userData.notificationSettings, 'crew_job_shared')) {
      console.log(`User ${doc.id} has disabled crew_job_shared notifications. Skipping.`);
      continue;
    }

    notifications.push({
      to: pushToken,
      sound: 'default',
      title: crew.name,
      body,
      data: {
        screen: 'CrewTailboard',
        crewId,
        feedId,
        jobId: asString(feedData.jobId),
      },
    });
  }

  if (notifications.length > 0) {
    await sendExpoNotifications(notifications);
    console.log(`Sent ${notifications.length} job share notifications for crew ${crewId}`);
  }
  return notifications.length;
}

export const notifyCrewMembersOnJobShared = onDocumentCreated(
  'crews/{crewId}/jobFeed/{feedId}',
  async (event) => {
    if (!event.data) {
      console.log('Event data is undefined.');
      return null;
    }

    try {
      await handleJobShared(event.params.crewId, event.params.feedId, event.data.data());
    } catch (error) {
      console.error('Error sending job share notifications:', error);
    }
    return null;
  }
);
