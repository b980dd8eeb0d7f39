jest.mock('firebase/firestore', () =>
  jest.requireActual<typeof import('./helpers/fakeFirestore')>('./helpers/fakeFirestore').createFakeFirestoreModule()
);
jest.mock('../../firebase', () => ({ db: {}, auth: { currentUser: null }, functions: {} }));

import { writeBatch } from 'firebase/firestore';
import {
  addComment,
  addSuggestedJob,
  createPost,
  listenToActivity,
  listenToJobFeed,
  markActivityRead,
  markJobAsApplied,
  markJobAsSaved,
  markJobAsViewed,
  reactToPost,
  removeReaction,
  togglePin,
} from '../tailboardService';
import { Job } from '../../types/Job';
import { FakeTimestamp, fakeTimestamp, getFakeFirestore, signIn } from './helpers/fakeFirestore';

describe('tailboardService', () => {
  const db = getFakeFirestore();
  let consoleSpy: jest.SpyInstance;

  const job: Job = {
    id: 'job-1',
    jobTitle: 'Journeyman Lineman',
    company: 'Quanta Services',
    tags: ['storm'],
  };

  beforeEach(() => {
    jest.clearAllMocks();
    db.clear();
    signIn('m1');
    consoleSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    db.seed('crews/c1', {
      name: 'Storm Crew',
      foremanId: 'f1',
      memberIds: ['f1', 'l1', 'm1'],
      roles: { f1: 'foreman', l1: 'lead', m1: 'member' },
      maxMembers: 10,
      isActive: true,
    });
  });

  afterEach(() => {
    consoleSpy.mockRestore();
  });

  describe('job feed', () => {
    it('should add a suggestion with a clamped, rounded score', async () => {
      const highId = await addSuggestedJob('c1', job, 104.6, ['Matches Journeyman Lineman'], 'aiMatch');
      const lowId = await addSuggestedJob('c1', job, -3, [], 'savedSearch');
      const midId = await addSuggestedJob('c1', job, 72.4, [], 'aiMatch');

      expect(highId).toBe('auto-1');
      expect(db.dataAt('crews/c1/jobFeed/auto-1')).toMatchObject({
        jobId: 'job-1',
        jobTitle: 'Journeyman Lineman',
        company: 'Quanta Services',
        matchScore: 100,
        matchReasons: ['Matches Journeyman Lineman'],
        viewedByMemberIds: [],
        tags: ['storm'],
        source: 'aiMatch',
      });
      expect(db.dataAt(`crews/c1/jobFeed/${lowId}`)?.matchScore).toBe(0);
      expect(db.dataAt(`crews/c1/jobFeed/${midId}`)?.matchScore).toBe(72);
    });

    it('should record views and saves once per member', async () => {
      db.seed('crews/c1/jobFeed/s1', { viewedByMemberIds: ['f1'], savedByMemberIds: [] });

      await markJobAsViewed('c1', 's1');
      await markJobAsViewed('c1', 's1');
      await markJobAsSaved('c1', 's1');

      expect(db.dataAt('crews/c1/jobFeed/s1')).toEqual({ viewedByMemberIds: ['f1', 'm1'], savedByMemberIds: ['m1'] });
    });

    it('should record an application as a view and an activity item', async () => {
      db.seed('crews/c1/jobFeed/s1', { viewedByMemberIds: [], appliedMemberIds: [] });

      await markJobAsApplied('c1', 's1');

      expect(db.dataAt('crews/c1/jobFeed/s1')).toEqual({ viewedByMemberIds: ['m1'], appliedMemberIds: ['m1'] });
      expect(db.dataAt('crews/c1/activity/auto-1')).toMatchObject({
        actorId: 'm1',
        type: 'jobApplied',
        data: { feedId: 's1' },
        readByMemberIds: ['m1'],
      });
    });

    it('should deliver the feed newest first', () => {
      db.seed('crews/c1/jobFeed/s1', { jobId: 'j1', suggestedAt: fakeTimestamp('2026-01-01T00:00:00Z') });
      db.seed('crews/c1/jobFeed/s2', { jobId: 'j2', suggestedAt: fakeTimestamp('2026-01-03T00:00:00Z') });
      const onChange = jest.fn();

      listenToJobFeed('c1', onChange);

      expect(onChange).toHaveBeenCalledWith([
        expect.objectContaining({ id: 's2', jobId: 'j2' }),
        expect.objectContaining({ id: 's1', jobId: 'j1' }),
      ]);
    });
  });

  describe('posts', () => {
    it('should create a post and announce it on the activity stream', async () => {
      const postId = await createPost('c1', ' Tailboard at 0600 ');

      expect(postId).toBe('auto-1');
      expect(db.dataAt('crews/c1/posts/auto-1')).toMatchObject({
        authorId: 'm1',
        content: 'Tailboard at 0600',
        attachmentUrls: [],
        isPinned: false,
        reactions: {},
        comments: [],
      });
      expect(db.dataAt('crews/c1/activity/auto-2')).toMatchObject({
        actorId: 'm1',
        type: 'announcementPosted',
        data: { postId: 'auto-1' },
      });
    });

    it('should only let leaders pin a new post', async () => {
      await expect(createPost('c1', 'Safety stand-down', { isPinned: true })).rejects.toThrow(
        'Only crew leaders can pin announcements'
      );

      signIn('l1');
      const postId = await createPost('c1', 'Safety stand-down', { isPinned: true });
      expect(db.dataAt(`crews/c1/posts/${postId}`)?.isPinned).toBe(true);
    });

    it('should reject outsiders and empty content', async () => {
      await expect(createPost('c1', '   ')).rejects.toThrow('Message content is required');

      signIn('x1');
      await expect(createPost('c1', 'Hello')).rejects.toThrow('You are not a member of this crew');
    });

    it('should set and clear a reaction', async () => {
      db.seed('crews/c1/posts/p1', { authorId: 'f1', reactions: { f1: 'love' } });

      await reactToPost('c1', 'p1', 'celebrate');
      expect(db.dataAt('crews/c1/posts/p1')?.reactions).toEqual({ f1: 'love', m1: 'celebrate' });

      await removeReaction('c1', 'p1');
      expect(db.dataAt('crews/c1/posts/p1')?.reactions).toEqual({ f1: 'love' });
    });

    it('should append a comment and return its id', async () => {
      db.seed('crews/c1/posts/p1', { authorId: 'f1', comments: [] });

      const commentId = await addComment('c1', 'p1', ' Copy that ');

      expect(db.dataAt('crews/c1/posts/p1')?.comments).toEqual([
        { id: commentId, authorId: 'm1', content: 'Copy that', postedAt: expect.any(FakeTimestamp) },
      ]);
    });

    it('should toggle the pin for leaders only', async () => {
      db.seed('crews/c1/posts/p1', { authorId: 'f1', isPinned: false });

      await expect(togglePin('c1', 'p1')).rejects.toThrow('Only crew leaders can pin announcements');

      signIn('f1');
      await expect(togglePin('c1', 'p1')).resolves.toBe(true);
      await expect(togglePin('c1', 'p1')).resolves.toBe(false);
      await expect(togglePin('c1', 'missing')).rejects.toThrow('Post not found');
    });
  });

  describe('activity', () => {
    it('should mark activity items read for the current member', async () => {
      db.seed('crews/c1/activity/a1', { type: 'memberJoined', readByMemberIds: ['f1'] });
      db.seed('crews/c1/activity/a2', { type: 'jobShared', readByMemberIds: [] });

      await markActivityRead('c1', ['a1', 'a2']);

      expect(db.dataAt('crews/c1/activity/a1')?.readByMemberIds).toEqual(['f1', 'm1']);
      expect(db.dataAt('crews/c1/activity/a2')?.readByMemberIds).toEqual(['m1']);
    });

    it('should do nothing for an empty list', async () => {
      await markActivityRead('c1', []);

      expect(writeBatch).not.toHaveBeenCalled();
    });

    it('should deliver the activity stream newest first', () => {
      db.seed('crews/c1/activity/a1', { type: 'memberJoined', timestamp: fakeTimestamp('2026-01-01T00:00:00Z') });
      db.seed('crews/c1/activity/a2', { type: 'crewCreated', timestamp: fakeTimestamp('2026-01-02T00:00:00Z') });
      const onChange = jest.fn();

      listenToActivity('c1', onChange);

      expect(onChange).toHaveBeenCalledWith([
        expect.objectContaining({ id: 'a2', type: 'crewCreated' }),
        expect.objectContaining({ id: 'a1', type: 'memberJoined' }),
      ]);
    });
  });
});
