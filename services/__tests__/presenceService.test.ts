jest.mock('firebase/firestore', () =>
  jest.requireActual<typeof import('./helpers/fakeFirestore')>('./helpers/fakeFirestore').createFakeFirestoreModule()
);
jest.mock('../../firebase', () => ({ db: {}, auth: { currentUser: null }, functions: {} }));

import { PresenceTracker, setOnlineStatus } from '../presenceService';
import { FakeTimestamp, getFakeFirestore } from './helpers/fakeFirestore';

describe('presenceService', () => {
  const db = getFakeFirestore();

  beforeEach(() => {
    jest.clearAllMocks();
    db.clear();
  });

  describe('setOnlineStatus', () => {
    it('should write the status and last seen time', async () => {
      db.seed('users/u1', { displayName: 'Sam', isOnline: false });

      await setOnlineStatus('u1', true);

      const data = db.dataAt('users/u1');
      expect(data?.isOnline).toBe(true);
      expect(data?.lastSeen).toBeInstanceOf(FakeTimestamp);
    });
  });

  describe('PresenceTracker', () => {
    const writeStatus = jest.fn<Promise<void>, [string, boolean]>();

    beforeEach(() => {
      writeStatus.mockResolvedValue(undefined);
    });

    it('should go online on start and follow lifecycle changes', async () => {
      const tracker = new PresenceTracker('u1', writeStatus);

      await tracker.start();
      await tracker.handleStateChange('background');
      await tracker.handleStateChange('inactive');
      await tracker.handleStateChange('active');

      expect(writeStatus.mock.calls).toEqual([
        ['u1', true],
        ['u1', false],
        ['u1', true],
      ]);
    });

    it('should go offline on stop and ignore later changes', async () => {
      const tracker = new PresenceTracker('u1', writeStatus);

      await tracker.start();
      await tracker.stop();
      await tracker.handleStateChange('active');

      expect(writeStatus.mock.calls).toEqual([
        ['u1', true],
        ['u1', false],
      ]);
    });

    it('should log write failures instead of throwing', async () => {
      const consoleSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
      const failure = new Error('offline');
      writeStatus.mockRejectedValueOnce(failure);
      const tracker = new PresenceTracker('u1', writeStatus);

      await expect(tracker.start()).resolves.toBeUndefined();

      expect(consoleSpy).toHaveBeenCalledWith('Error setting initial online status:', failure);
      consoleSpy.mockRestore();
    });

    it('should write again after a failed write', async () => {
      const consoleSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
      writeStatus.mockRejectedValueOnce(new Error('offline'));
      const tracker = new PresenceTracker('u1', writeStatus);

      await tracker.start();
      await tracker.handleStateChange('active');

      expect(writeStatus.mock.calls).toEqual([
        ['u1', true],
        ['u1', true],
      ]);
      consoleSpy.mockRestore();
    });
  });
});
