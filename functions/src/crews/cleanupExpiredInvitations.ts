import { onSchedule } from 'firebase-functions/v2/scheduler';
import * as admin from 'firebase-admin';
import { BatchWrite, commitInBatches } from '../utils/crewRecords';

/**
 * Marks pending invitations whose expiry has passed as expired.
 * @param {admin.firestore.Timestamp} now The cut-off time
 * @return {Promise<number>} How many invitations were expired
 */
export async function expirePendingInvitations(
  now: admin.firestore.Timestamp = admin.firestore.Timestamp.now()
): Promise<number> {
  const db = admin.firestore();
  const snapshot = await db
    .collection('crewInvitations')
    .where('status', '==', 'pending')
    .where('expiresAt', '<=', now)
    .get();

  await commitInBatches(
    db,
    snapshot.docs.map((doc): BatchWrite => (batch) => {
      batch.update(doc.ref, { status: 'expired' });
    })
  );

  return snapshot.docs.length;
}

export const cleanupExpiredInvitations = onSchedule({
  schedule: '0 3 * * *',
  timeZone: 'America/Chicago',
}, async (event) => {
  console.log(`Starting cleanupExpiredInvitations run. Triggered at: ${event.scheduleTime}`);
  try {
    const expired = await expirePendingInvitations();
    console.log(`Expired ${expired} crew invitations.`);
  } catch (error) {
    console.error('Error cleaning up expired invitations:', error);
  }
});
