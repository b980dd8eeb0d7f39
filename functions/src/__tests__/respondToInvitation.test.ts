import * as admin from 'firebase-admin';
import { handleRespondToInvitation } from '../crews/respondToInvitation';
import { getFakeFirestore } from './helpers/fakeAdmin';

jest.mock('firebase-admin', () =>
  jest.requireActual<typeof import('./helpers/fakeAdmin')>('./helpers/fakeAdmin').createFakeAdminModule()
);

const db = getFakeFirestore();
const DAY_MS = 24 * 60 * 60 * 1000;

describe('handleRespondToInvitation', () => {
  beforeEach(async () => {
    db.clear();
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);

    await db.doc('crews/c1').set({
      name: 'Storm Crew',
      foremanId: 'f',
      memberIds: ['f'],
      roles: { f: 'foreman' },
      maxMembers: 3,
    });
    await db.doc('crewInvitations/inv1').set({
      crewId: 'c1',
      crewName: 'Storm Crew',
      inviterId: 'f',
      inviteeId: 'u2',
      status: 'pending',
      expiresAt: admin.firestore.Timestamp.fromMillis(Date.now() + DAY_MS),
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should only let the invitee respond', async () => {
    await expect(handleRespondToInvitation({ invitationId: 'inv1', accept: true }, 'u9')).rejects.toMatchObject({
      code: 'permission-denied',
    });
  });

  it('should require an explicit accept flag', async () => {
    await expect(handleRespondToInvitation({ invitationId: 'inv1' }, 'u2')).rejects.toMatchObject({
      code: 'invalid-argument',
    });
  });

  it('should record a decline without touching the crew', async () => {
    const result = await handleRespondToInvitation({ invitationId: 'inv1', accept: false }, 'u2');

    expect(result).toEqual({ crewId: 'c1', status: 'declined' });
    expect(db.dataAt('crewInvitations/inv1')?.status).toBe('declined');
    expect(db.dataAt('crews/c1')?.memberIds).toEqual(['f']);
  });

  it('should add the invitee to the crew on accept', async () => {
    const result = await handleRespondToInvitation({ invitationId: 'inv1', accept: true }, 'u2');

    expect(result).toEqual({ crewId: 'c1', status: 'accepted' });
    expect(db.dataAt('crews/c1')).toMatchObject({
      memberIds: ['f', 'u2'],
      roles: { f: 'foreman', u2: 'member' },
    });
    expect(db.dataAt('users/u2')).toEqual({ crewIds: ['c1'] });
    expect(db.dataAt('crewInvitations/inv1')?.status).toBe('accepted');
  });

  it('should refuse when the crew filled up in the meantime', async () => {
    await db.doc('crews/c1').update({ memberIds: ['f', 'a', 'b'] });

    await expect(handleRespondToInvitation({ invitationId: 'inv1', accept: true }, 'u2')).rejects.toMatchObject({
      code: 'resource-exhausted',
    });
    expect(db.dataAt('crewInvitations/inv1')?.status).toBe('pending');
  });

  it('should refuse to add the invitee to an inactive crew', async () => {
    await db.doc('crews/c1').update({ isActive: false });

    await expect(handleRespondToInvitation({ invitationId: 'inv1', accept: true }, 'u2')).rejects.toMatchObject({
      code: 'failed-precondition',
      message: 'This crew is no longer active.',
    });
    expect(db.dataAt('crews/c1')?.memberIds).toEqual(['f']);
    expect(db.dataAt('crewInvitations/inv1')?.status).toBe('pending');
  });

  it('should expire an invitation that is past its expiry', async () => {
    await db.doc('crewInvitations/inv1').update({
      expiresAt: admin.firestore.Timestamp.fromMillis(Date.now() - DAY_MS),
    });

    await expect(handleRespondToInvitation({ invitationId: 'inv1', accept: true }, 'u2')).rejects.toMatchObject({
      code: 'failed-precondition',
      message: 'This invitation has expired.',
    });
    expect(db.dataAt('crewInvitations/inv1')?.status).toBe('expired');
    expect(db.dataAt('crews/c1')?.memberIds).toEqual(['f']);
  });

  it('should not accept an invitation twice', async () => {
    await handleRespondToInvitation({ invitationId: 'inv1', accept: true }, 'u2');

    await expect(handleRespondToInvitation({ invitationId: 'inv1', accept: true }, 'u2')).rejects.toMatchObject({
      code: 'failed-precondition',
      message: 'This invitation is no longer pending.',
    });
  });
});
