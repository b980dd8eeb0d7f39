import {
  asOptionalDate,
  crewFromFirestore,
  messageFromFirestore,
  postFromFirestore,
  preferencesToFirestore,
  suggestedJobFromFirestore,
  userFromFirestore,
} from '../firestoreMappers';
import { orderPosts } from '../tailboard';
import { CREW_PREFERENCE_PRESETS } from '../../types/CrewPreferences';

describe('firestoreMappers', () => {
  const created = new Date('2026-01-01T00:00:00Z');
  const timestamp = { toDate: () => created };

  describe('asOptionalDate', () => {
    it('should convert timestamps, dates, strings and millis', () => {
      expect(asOptionalDate(timestamp)).toEqual(created);
      expect(asOptionalDate(created)).toBe(created);
      expect(asOptionalDate('2026-01-01T00:00:00Z')).toEqual(created);
      expect(asOptionalDate(0)).toEqual(new Date(0));
    });

    it('should return undefined for anything else', () => {
      expect(asOptionalDate('not a date')).toBeUndefined();
      expect(asOptionalDate(null)).toBeUndefined();
    });
  });

  describe('crewFromFirestore', () => {
    it('should narrow fields and fill defaults', () => {
      const crew = crewFromFirestore('c1', {
        name: 'Storm Crew',
        foremanId: 'f1',
        memberIds: ['f1', 7, 'u1'],
        roles: { f1: 'foreman', u1: 'boss' },
        createdAt: timestamp,
        preferences: { jobTypes: ['Operator'], matchThreshold: 70 },
      });

      expect(crew).toEqual({
        id: 'c1',
        name: 'Storm Crew',
        foremanId: 'f1',
        memberIds: ['f1', 'u1'],
        roles: { f1: 'foreman' },
        maxMembers: 10,
        preferences: {
          jobTypes: ['Operator'],
          constructionTypes: [],
          preferredCompanies: [],
          requiredSkills: [],
          autoShareEnabled: false,
          matchThreshold: 70,
        },
        stats: { totalJobsShared: 0, totalMessages: 0 },
        isActive: true,
        createdAt: created,
      });
    });
  });

  describe('suggestedJobFromFirestore', () => {
    it('should default an unknown source to aiMatch', () => {
      const job = suggestedJobFromFirestore('s1', { jobId: 'j1', source: 'rumor', matchScore: 72 });

      expect(job.source).toBe('aiMatch');
      expect(job.jobTitle).toBe('Untitled job');
      expect(job.matchScore).toBe(72);
    });
  });

  describe('pending server timestamps', () => {
    const now = new Date('2026-03-01T12:00:00Z');

    beforeEach(() => {
      jest.useFakeTimers();
      jest.setSystemTime(now);
    });

    afterEach(() => {
      jest.useRealTimers();
    });

    it('should read a null timestamp as now', () => {
      expect(messageFromFirestore('c1', 'm1', { senderId: 'u1', createdAt: null }).createdAt).toEqual(now);
      expect(suggestedJobFromFirestore('s1', { jobId: 'j1', suggestedAt: null }).suggestedAt).toEqual(now);
      expect(postFromFirestore('p1', { authorId: 'u1', postedAt: null }).postedAt).toEqual(now);
    });

    it('should order a post that is still being written ahead of older posts', () => {
      const older = postFromFirestore('p0', { authorId: 'u2', postedAt: timestamp });
      const pending = postFromFirestore('p1', { authorId: 'u1', postedAt: null });

      expect(orderPosts([older, pending]).map((post) => post.id)).toEqual(['p1', 'p0']);
    });

    it('should keep a timestamp the server has written', () => {
      expect(messageFromFirestore('c1', 'm1', { senderId: 'u1', createdAt: timestamp }).createdAt).toEqual(created);
    });
  });

  describe('messageFromFirestore', () => {
    it('should default the type and keep only string reactions', () => {
      const message = messageFromFirestore('c1', 'm1', {
        senderId: 'u1',
        text: 'Heading out',
        type: 'poll',
        reactions: { u2: '👍', u3: 5 },
        createdAt: timestamp,
      });

      expect(message).toEqual({
        id: 'm1',
        crewId: 'c1',
        senderId: 'u1',
        text: 'Heading out',
        type: 'text',
        reactions: { u2: '👍' },
        createdAt: created,
        isDeleted: false,
      });
    });
  });

  describe('preferencesToFirestore', () => {
    it('should drop unset optional numbers', () => {
      const { minHourlyRate, maxDistanceMiles, ...rest } = CREW_PREFERENCE_PRESETS.lineman;
      const data = preferencesToFirestore(rest);

      expect(minHourlyRate).toBe(45);
      expect(maxDistanceMiles).toBe(100);
      expect(Object.keys(data)).toEqual([
        'jobTypes',
        'constructionTypes',
        'preferredCompanies',
        'requiredSkills',
        'autoShareEnabled',
        'matchThreshold',
      ]);
    });
  });

  describe('userFromFirestore', () => {
    it('should default the display name and notification settings', () => {
      expect(userFromFirestore('u1', { email: 'sam@example.com' }).displayName).toBe('Unknown User');
      expect(userFromFirestore('u1', {}).notificationSettings).toBeUndefined();
      expect(userFromFirestore('u1', { notificationSettings: { crewMessages: false } }).notificationSettings).toEqual({
        crewMessages: false,
        safetyAlerts: true,
        jobSharing: true,
        crewManagement: true,
      });
    });
  });
});
