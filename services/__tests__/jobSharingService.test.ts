jest.mock('firebase/firestore', () =>
  jest.requireActual<typeof import('./helpers/fakeFirestore')>('./helpers/fakeFirestore').createFakeFirestoreModule()
);
jest.mock('../../firebase', () => ({ db: {}, auth: { currentUser: null }, functions: {} }));

import { writeBatch } from 'firebase/firestore';
import { autoShareJob, MAX_BATCH_WRITES, MEMBER_SHARE_REASON, shareJobToCrews } from '../jobSharingService';
import { Crew } from '../../types/Crew';
import { CREW_PREFERENCE_PRESETS } from '../../types/CrewPreferences';
import { Job } from '../../types/Job';
import { FakeTimestamp, getFakeFirestore, signIn } from './helpers/fakeFirestore';

describe('jobSharingService', () => {
  const db = getFakeFirestore();
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    jest.clearAllMocks();
    db.clear();
    signIn('l1');
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
    errorSpy.mockRestore();
  });

  describe('shareJobToCrews', () => {
    beforeEach(() => {
      db.seed('jobs/job-1', { jobTitle: 'Journeyman Lineman', company: 'Quanta Services', tags: ['storm'] });
      db.seed('crews/c1', {
        name: 'Storm Crew',
        foremanId: 'f1',
        memberIds: ['f1', 'l1'],
        roles: { f1: 'foreman', l1: 'lead' },
        stats: { totalJobsShared: 2, totalMessages: 0 },
        isActive: true,
      });
      db.seed('crews/c2', {
        name: 'Night Crew',
        foremanId: 'f2',
        memberIds: ['f2', 'l1'],
        roles: { f2: 'foreman', l1: 'member' },
        isActive: true,
      });
    });

    it('should share to the crews the member can share to', async () => {
      const sharedTo = await shareJobToCrews('job-1', ['c1', 'c1', 'c2', 'missing'], ' Good overtime ');

      expect(sharedTo).toEqual(['c1']);
      expect(warnSpy).toHaveBeenCalledTimes(2);
      expect(db.dataAt('crews/c1/jobFeed/auto-1')).toMatchObject({
        jobId: 'job-1',
        jobTitle: 'Journeyman Lineman',
        company: 'Quanta Services',
        matchScore: 100,
        matchReasons: [MEMBER_SHARE_REASON, 'Good overtime'],
        viewedByMemberIds: ['l1'],
        appliedMemberIds: [],
        tags: ['storm'],
        source: 'memberShare',
        sharedBy: 'l1',
      });
      expect(db.dataAt('crews/c1/activity/auto-2')).toMatchObject({
        actorId: 'l1',
        type: 'jobShared',
        data: { jobId: 'job-1', feedId: 'auto-1', jobTitle: 'Journeyman Lineman' },
        readByMemberIds: ['l1'],
      });
      expect(db.dataAt('crews/c1')?.stats).toEqual({
        totalJobsShared: 3,
        totalMessages: 0,
        lastActivityAt: expect.any(FakeTimestamp),
      });
      expect(db.dataAt('crews/c2/jobFeed/auto-3')).toBeUndefined();
    });

    it('should write nothing when no crew accepts the share', async () => {
      await expect(shareJobToCrews('job-1', ['c2'])).resolves.toEqual([]);
      expect(db.store.has('crews/c2/jobFeed/auto-1')).toBe(false);
    });

    it('should fail for a missing job', async () => {
      await expect(shareJobToCrews('job-9', ['c1'])).rejects.toThrow('Job not found');
    });

    it('should validate the comment', async () => {
      await expect(shareJobToCrews('job-1', ['c1'], '<script>x</script>')).rejects.toThrow(
        'Message contains potentially harmful content'
      );
    });
  });

  describe('autoShareJob', () => {
    const job: Job = {
      id: 'job-2',
      jobTitle: 'Journeyman Lineman',
      company: 'Quanta Services',
      classification: 'Journeyman Lineman',
      constructionType: 'Transmission',
      hourlyRate: 52.5,
      distanceMiles: 80,
      tags: [],
    };

    const buildCrew = (id: string, overrides: Partial<Crew> = {}): Crew => ({
      id,
      name: 'Storm Crew',
      foremanId: 'f1',
      memberIds: ['f1'],
      roles: { f1: 'foreman' },
      maxMembers: 10,
      preferences: CREW_PREFERENCE_PRESETS.lineman,
      stats: { totalJobsShared: 0, totalMessages: 0 },
      isActive: true,
      createdAt: new Date('2026-01-01T00:00:00Z'),
      ...overrides,
    });

    it('should add the job to active crews that want it', async () => {
      const crews = [
        buildCrew('c1'),
        buildCrew('c2', { preferences: { ...CREW_PREFERENCE_PRESETS.lineman, autoShareEnabled: false } }),
        buildCrew('c3', { isActive: false }),
        buildCrew('c4', { preferences: CREW_PREFERENCE_PRESETS.insideWireman }),
      ];

      const sharedTo = await autoShareJob(job, crews);

      expect(sharedTo).toEqual(['c1']);
      expect(db.dataAt('crews/c1/jobFeed/auto-1')).toMatchObject({
        jobId: 'job-2',
        matchScore: 100,
        matchReasons: [
          'Matches Journeyman Lineman',
          'Transmission construction',
          'Pays $52.50/hr',
          '80 miles away',
          'Preferred company: Quanta Services',
        ],
        viewedByMemberIds: [],
        source: 'autoShare',
      });
    });

    it('should split writes across batches past the write limit', async () => {
      const crews = Array.from({ length: MAX_BATCH_WRITES + 1 }, (_, i) => buildCrew(`c${i + 1}`));

      const sharedTo = await autoShareJob(job, crews);

      expect(sharedTo).toHaveLength(501);
      expect(writeBatch).toHaveBeenCalledTimes(2);
      expect(db.dataAt('crews/c501/jobFeed/auto-501')).toMatchObject({ jobId: 'job-2', source: 'autoShare' });
    });

    it('should not open a batch when no crew wants the job', async () => {
      await expect(autoShareJob(job, [buildCrew('c1', { isActive: false })])).resolves.toEqual([]);
      expect(writeBatch).not.toHaveBeenCalled();
    });
  });
});
