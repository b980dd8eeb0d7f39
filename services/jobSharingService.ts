// services/jobSharingService.ts
import { chunk } from 'lodash';
import {
  doc,
  collection,
  getDoc,
  increment,
  serverTimestamp,
  writeBatch,
  WriteBatch,
} from 'firebase/firestore';
import { db } from '../firebase';
import { Crew } from '../types/Crew';
import { Job } from '../types/Job';
import { CrewError } from '../utils/crewErrors';
import { hasCrewPermission } from '../utils/crewPermissions';
import { validateMessageContent } from '../utils/crewValidation';
import { jobFromFirestore } from '../utils/firestoreMappers';
import { calculateMatchScore, shouldAutoShare } from '../utils/jobMatching';
import { requireCrewUser } from './authService';
import { getCrew } from './crewService';

export const MEMBER_SHARE_SCORE = 100;
export const MEMBER_SHARE_REASON = 'Shared by crew member';
export const MAX_BATCH_WRITES = 500;

type CrewWrites = (batch: WriteBatch) => void;

/**
 * Commit per-crew writes in as many batches as the write limit needs. The
 * writes for one crew always land in the same batch.
 */
const commitInBatches = async (crewWrites: CrewWrites[], writesPerCrew: number) => {
  const crewsPerBatch = Math.floor(MAX_BATCH_WRITES / writesPerCrew);
  for (const group of chunk(crewWrites, crewsPerBatch)) {
    const batch = writeBatch(db);
    group.forEach((write) => write(batch));
    await batch.commit();
  }
};

/**
 * Share a job to several crews at once. Crews the current user cannot share
 * to are skipped. Returns the ids of the crews the job was shared to.
 */
export const shareJobToCrews = async (
  jobId: string,
  crewIds: string[],
  comment?: string,
): Promise<string[]> => {
  try {
    const user = requireCrewUser();
    const trimmedComment = comment?.trim();
    if (trimmedComment) {
      const commentError = validateMessageContent(trimmedComment);
      if (commentError) {
        throw new CrewError('invalid-argument', commentError);
      }
    }

    const jobDoc = await getDoc(doc(db, 'jobs', jobId));
    if (!jobDoc.exists()) {
      throw new CrewError('not-found', 'Job not found');
    }
    const job = jobFromFirestore(jobDoc.id, jobDoc.data());

    const crewWrites: CrewWrites[] = [];
    const sharedTo: string[] = [];

    for (const crewId of new Set(crewIds)) {
      const crew = await getCrew(crewId);
      if (!crew || !hasCrewPermission(crew, user.uid, 'shareJobs')) {
        console.warn(`Skipping crew ${crewId}: cannot share jobs there`);
        continue;
      }

      crewWrites.push((batch) => {
        const feedRef = doc(collection(db, 'crews', crewId, 'jobFeed'));
        batch.set(feedRef, {
          jobId: job.id,
          jobTitle: job.jobTitle,
          company: job.company,
          matchScore: MEMBER_SHARE_SCORE,
          matchReasons: trimmedComment ? [MEMBER_SHARE_REASON, trimmedComment] : [MEMBER_SHARE_REASON],
          viewedByMemberIds: [user.uid],
          appliedMemberIds: [],
          savedByMemberIds: [],
          tags: job.tags,
          suggestedAt: serverTimestamp(),
          source: 'memberShare',
          sharedBy: user.uid,
        });
        batch.set(doc(collection(db, 'crews', crewId, 'activity')), {
          actorId: user.uid,
          type: 'jobShared',
          data: { jobId: job.id, feedId: feedRef.id, jobTitle: job.jobTitle },
          timestamp: serverTimestamp(),
          readByMemberIds: [user.uid],
        });
        batch.update(doc(db, 'crews', crewId), {
          'stats.totalJobsShared': increment(1),
          'stats.lastActivityAt': serverTimestamp(),
        });
      });
      sharedTo.push(crewId);
    }

    await commitInBatches(crewWrites, 3);
    return sharedTo;
  } catch (error) {
    console.error('Error sharing job to crews:', error);
    throw error;
  }
};

/**
 * Put a job on the feed of every crew whose preferences ask for it.
 * Returns the ids of the crews it was added to.
 */
export const autoShareJob = async (job: Job, crews: Crew[]): Promise<string[]> => {
  try {
    const crewWrites: CrewWrites[] = [];
    const sharedTo: string[] = [];

    crews
      .filter((crew) => crew.isActive && shouldAutoShare(job, crew.preferences))
      .forEach((crew) => {
        const { score, reasons } = calculateMatchScore(job, crew.preferences);
        crewWrites.push((batch) => batch.set(doc(collection(db, 'crews', crew.id, 'jobFeed')), {
          jobId: job.id,
          jobTitle: job.jobTitle,
          company: job.company,
          matchScore: score,
          matchReasons: reasons,
          viewedByMemberIds: [],
          appliedMemberIds: [],
          savedByMemberIds: [],
          tags: job.tags,
          suggestedAt: serverTimestamp(),
          source: 'autoShare',
        }));
        sharedTo.push(crew.id);
      });

    await commitInBatches(crewWrites, 1);
    return sharedTo;
  } catch (error) {
    console.error('Error auto-sharing job:', error);
    throw error;
  }
};
