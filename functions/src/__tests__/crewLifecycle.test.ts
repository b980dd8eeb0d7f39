import * as admin from 'firebase-admin';
import { handleCrewCreated } from '../crews/onCrewCreated';
import { expirePendingInvitations } from '../crews/cleanupExpiredInvitations';
import { getFakeFirestore } from './helpers/fakeAdmin';

jest.mock('firebase-admin', () =>
  jest.requireActual<typeof import('./helpers/fakeAdmin')>('./helpers/fakeAdmin').createFakeAdminModule()
);

const db = getFakeFirestore();

beforeEach(() => {
  db.clear();
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('handleCrewCreated', () => {
  it('should open the activity stream with a crewCreated item', async () => {
    const activityId = await handleCrewCreated('c1', { name: 'Storm Crew', foremanId: 'f', memberIds: ['f'] });

    expect(activityId).toBe('auto-1');
    expect(db.dataAt('crews/c1/activity/auto-1')).toMatchObject({
      actorId: 'f',
      type: 'crewCreated',
      data: { crewName: 'Storm Crew' },
      readByMemberIds: ['f'],
    });
  });
});

describe('expirePendingInvitations', () => {
  it('should expire only pending invitations past their expiry', async () => {
    const now = admin.firestore.Timestamp.fromMillis(10_000_000);
    await db.doc('crewInvitations/old').set({
      status: 'pending',
      expiresAt: admin.firestore.Timestamp.fromMillis(9_000_000),
    });
    await db.doc('crewInvitations/fresh').set({
      status: 'pending',
      expiresAt: admin.firestore.Timestamp.fromMillis(11_000_000),
    });
    await db.doc('crewInvitations/answered').set({
      status: 'accepted',
      expiresAt: admin.firestore.Timestamp.fromMillis(9_000_000),
    });

    await expect(expirePendingInvitations(now)).resolves.toBe(1);

    expect(db.dataAt('crewInvitations/old')?.status).toBe('expired');
    expect(db.dataAt('crewInvitations/fresh')?.status).toBe('pending');
    expect(db.dataAt('crewInvitations/answered')?.status).toBe('accepted');
  });
});
