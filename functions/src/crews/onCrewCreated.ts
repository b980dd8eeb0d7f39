import { onDocumentCreated } from 'firebase-functions/v2/firestore';
import * as admin from 'firebase-admin';
import { readCrew } from '../utils/crewRecords';

/**
 * Opens a new crew's activity stream with a crewCreated entry.
 * @param {string} crewId The crew
 * @param {admin.firestore.DocumentData} crewData The new crew document
 * @return {Promise<string>} The activity item id
 */
export async function handleCrewCreated(crewId: string, crewData: admin.firestore.DocumentData): Promise<string> {
  const db = admin.firestore();
  const crew = readCrew(crewData);

  const activityDoc = await db.collection('crews').doc(crewId).collection('activity').add({
    actorId: crew.foremanId,
    type: 'crewCreated',
    data: { crewName: crew.name },
    timestamp: admin.firestore.FieldValue.serverTimestamp(),
    readByMemberIds: [crew.foremanId],
  });
  console.log(`Recorded creation of crew ${crewId}`);
  return activityDoc.id;
}

export const onCrewCreated = onDocumentCreated(
  'crews/{crewId}',
  async (event) => {
    if (!event.data) {
      console.log('Event data is undefined.');
      return null;
    }

    try {
      await handleCrewCreated(event.params.crewId, event.data.data());
    } catch (error) {
      console.error('Error recording crew creation:', error);
    }
    return null;
  }
);
