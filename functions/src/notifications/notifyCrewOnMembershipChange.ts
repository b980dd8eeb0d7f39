import { onDocumentUpdated } from 'firebase-functions/v2/firestore';
import * as admin from 'firebase-admin';
import { ExpoPushMessage } from 'expo-server-sdk';
import { sendExpoNotifications } from '../utils/sendExpoNotifications';
import { NotificationType, shouldSendNotification } from '../utils/notificationSettings';
import { fetchUsersByIds, getDisplayName, getPushToken, readCrew } from '../utils/crewRecords';

export interface MembershipChange {
  joined: string[];
  left: string[];
}

export const diffMembers = (before: string[], after: string[]): MembershipChange => ({
  joined: after.filter((id) => !before.includes(id)),
  left: before.filter((id) => !after.includes(id)),
});

/**
 * Records joins and departures on the crew's activity stream and lets the
 * remaining members know.
 * @param {string} crewId The crew
 * @param {admin.firestore.DocumentData} beforeData Crew document before the update
 * @param {admin.firestore.DocumentData} afterData Crew document after the update
 * @return {Promise<number>} The number of notifications sent
 */
export async function handleCrewMembershipChange(
  crewId: string,
  beforeData: admin.firestore.DocumentData,
  afterData: admin.firestore.DocumentData
): Promise<number> {
  const db = admin.firestore();
  const before = readCrew(beforeData);
  const after = readCrew(afterData);
  const { joined, left } = diffMembers(before.memberIds, after.memberIds);

  if (joined.length === 0 && left.length === 0) {
    return 0;
  }

  const activityRef = db.collection('crews').doc(crewId).collection('activity');
  const batch = db.batch();
  joined.forEach((uid) => {
    batch.set(activityRef.doc(), {
      actorId: uid,
      type: 'memberJoined',
      data: {},
      timestamp: admin.firestore.FieldValue.serverTimestamp(),
      readByMemberIds: [],
    });
  });
  left.forEach((uid) => {
    batch.set(activityRef.doc(), {
      actorId: uid,
      type: 'memberLeft',
      data: {},
      timestamp: admin.firestore.FieldValue.serverTimestamp(),
      readByMemberIds: [],
    });
  });
  await batch.commit();

  const changedDocs = await fetchUsersByIds(db, [...joined, ...left]);
  const nameOf = (uid: string): string =>
    getDisplayName(changedDocs.find((doc) => doc.id === uid)?.data(), 'A crew member');

  const recipientIds = after.memberIds.filter((id) => !joined.includes(id));
  if (recipientIds.length === 0) {
    return 0;
  }
  const recipientDocs = await fetchUsersByIds(db, recipientIds);

  const announcements: { type: NotificationType; body: string }[] = [
    ...joined.map((uid) => ({ type: 'crew_member_joined' as const, body: `${nameOf(uid)} joined the crew` })),
    ...left.map((uid) => ({ type: 'crew_member_left' as const, body: `${nameOf(uid)} left the crew` })),
  ];

  const notifications: ExpoPushMessage[] = [];
  for (const doc of recipientDocs) {
    const userData = doc.data();
    const pushToken = getPushToken(userData);
    if (!pushToken) continue;

    announcements
      .filter(({ type }) => shouldSendNotification(userData.notificationSettings, type))
      .forEach(({ body }) => {
        notifications.push({
          to: pushToken,
          sound: 'default',
          title: after.name,
          body,
          data: {
            screen: 'Crew',
            crewId,
          },
        });
      });
  }

  if (notifications.length > 0) {
    await sendExpoNotifications(notifications);
    console.log(`Sent ${notifications.length} membership notifications for crew ${crewId}`);
  }
  return notifications.length;
}

export const notifyCrewOnMembershipChange = onDocumentUpdated(
  'crews/{crewId}',
  async (event) => {
    const beforeData = event.data?.before.data();
    const afterData = event.data?.after.data();
    if (!beforeData || !afterData) {
      console.log('Crew update event is missing data.');
      return null;
    }

    try {
      await handleCrewMembershipChange(event.params.crewId, beforeData, afterData);
    } catch (error) {
      console.error('Error handling crew membership change:', error);
    }
    return null;
  }
);
