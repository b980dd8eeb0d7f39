// services/tailboardService.ts
// The crew tailboard: job feed, activity stream and posts under crews/{crewId}.

import { randomUUID } from 'crypto';
import {
  addDoc,
  arrayUnion,
  collection,
  deleteField,
  doc,
  getDoc,
  limit,
  onSnapshot,
  orderBy,
  query,
  serverTimestamp,
  Timestamp,
  Unsubscribe,
  updateDoc,
  writeBatch,
} from 'firebase/firestore';
import { db } from '../firebase';
import { Job } from '../types/Job';
import {
  ACTIVITY_PAGE_SIZE,
  ActivityItem,
  JobSuggestionSource,
  ReactionType,
  SuggestedJob,
  TailboardPost,
} from '../types/Tailboard';
import { CrewError } from '../utils/crewErrors';
import { hasCrewPermission } from '../utils/crewPermissions';
import { validateMessageContent } from '../utils/crewValidation';
import {
  activityFromFirestore,
  postFromFirestore,
  suggestedJobFromFirestore,
} from '../utils/firestoreMappers';
import { requireCrewUser } from './authService';
import { getCrew } from './crewService';

const jobFeedRef = (crewId: string) => collection(db, 'crews', crewId, 'jobFeed');
const activityRef = (crewId: string) => collection(db, 'crews', crewId, 'activity');
const postsRef = (crewId: string) => collection(db, 'crews', crewId, 'posts');

// ============================================================================
// LISTENERS
// ============================================================================

export const listenToJobFeed = (
  crewId: string,
  onChange: (jobs: SuggestedJob[]) => void,
  onError?: (error: Error) => void,
): Unsubscribe =>
  onSnapshot(
    query(jobFeedRef(crewId), orderBy('suggestedAt', 'desc')),
    (snapshot) =>
      onChange(snapshot.docs.map((jobDoc) => suggestedJobFromFirestore(jobDoc.id, jobDoc.data()))),
    (error) => {
      console.error('Error listening to job feed:', error);
      onError?.(error);
    },
  );

export const listenToActivity = (
  crewId: string,
  onChange: (items: ActivityItem[]) => void,
  onError?: (error: Error) => void,
): Unsubscribe =>
  onSnapshot(
    query(activityRef(crewId), orderBy('timestamp', 'desc'), limit(ACTIVITY_PAGE_SIZE)),
    (snapshot) =>
      onChange(snapshot.docs.map((itemDoc) => activityFromFirestore(itemDoc.id, itemDoc.data()))),
    (error) => {
      console.error('Error listening to crew activity:', error);
      onError?.(error);
    },
  );

export const listenToPosts = (
  crewId: string,
  onChange: (posts: TailboardPost[]) => void,
  onError?: (error: Error) => void,
): Unsubscribe =>
  onSnapshot(
    query(postsRef(crewId), orderBy('postedAt', 'desc')),
    (snapshot) =>
      onChange(snapshot.docs.map((postDoc) => postFromFirestore(postDoc.id, postDoc.data()))),
    (error) => {
      console.error('Error listening to tailboard posts:', error);
      onError?.(error);
    },
  );

// ============================================================================
// JOB FEED
// ============================================================================

/**
 * Add a job to a crew's feed. Returns the feed row id.
 */
export const addSuggestedJob = async (
  crewId: string,
  job: Job,
  matchScore: number,
  matchReasons: string[],
  source: JobSuggestionSource,
): Promise<string> => {
  try {
    const feedDoc = await addDoc(jobFeedRef(crewId), {
      jobId: job.id,
      jobTitle: job.jobTitle,
      company: job.company,
      matchScore: Math.max(0, Math.min(100, Math.round(matchScore))),
      matchReasons,
      viewedByMemberIds: [],
      appliedMemberIds: [],
      savedByMemberIds: [],
      tags: job.tags,
      suggestedAt: serverTimestamp(),
      source,
    });
    return feedDoc.id;
  } catch (error) {
    console.error('Error adding suggested job:', error);
    throw error;
  }
};

export const markJobAsViewed = async (crewId: string, feedId: string): Promise<void> => {
  try {
    const user = requireCrewUser();
    await updateDoc(doc(jobFeedRef(crewId), feedId), {
      viewedByMemberIds: arrayUnion(user.uid),
    });
  } catch (error) {
    console.error('Error marking job as viewed:', error);
    throw error;
  }
};

/**
 * Record an application. Applying also counts as viewing, and is announced
 * on the activity stream.
 */
export const markJobAsApplied = async (crewId: string, feedId: string): Promise<void> => {
  try {
    const user = requireCrewUser();
    const batch = writeBatch(db);
    batch.update(doc(jobFeedRef(crewId), feedId), {
      appliedMemberIds: arrayUnion(user.uid),
      viewedByMemberIds: arrayUnion(user.uid),
    });
    batch.set(doc(activityRef(crewId)), {
      actorId: user.uid,
      type: 'jobApplied',
      data: { feedId },
      timestamp: serverTimestamp(),
      readByMemberIds: [user.uid],
    });
    await batch.commit();
  } catch (error) {
    console.error('Error marking job as applied:', error);
    throw error;
  }
};

export const markJobAsSaved = async (crewId: string, feedId: string): Promise<void> => {
  try {
    const user = requireCrewUser();
    await updateDoc(doc(jobFeedRef(crewId), feedId), {
      savedByMemberIds: arrayUnion(user.uid),
    });
  } catch (error) {
    console.error('Error saving job:', error);
    throw error;
  }
};

// ============================================================================
// POSTS
// ============================================================================

export interface NewPostOptions {
  isPinned?: boolean;
  attachmentUrls?: string[];
}

export const createPost = async (
  crewId: string,
  content: string,
  { isPinned = false, attachmentUrls = [] }: NewPostOptions = {},
): Promise<string> => {
  try {
    const user = requireCrewUser();
    const contentError = validateMessageContent(content);
    if (contentError) {
      throw new CrewError('invalid-argument', contentError);
    }
    const crew = await getCrew(crewId);
    if (!crew) {
      throw new CrewError('not-found', 'Crew not found');
    }
    if (!hasCrewPermission(crew, user.uid, 'viewCrew')) {
      throw new CrewError('permission-denied', 'You are not a member of this crew');
    }
    if (isPinned && !hasCrewPermission(crew, user.uid, 'postAnnouncements')) {
      throw new CrewError('permission-denied', 'Only crew leaders can pin announcements');
    }

    const postRef = doc(postsRef(crewId));
    const batch = writeBatch(db);
    batch.set(postRef, {
      authorId: user.uid,
      content: content.trim(),
      attachmentUrls,
      isPinned,
      reactions: {},
      comments: [],
      postedAt: serverTimestamp(),
    });
    batch.set(doc(activityRef(crewId)), {
      actorId: user.uid,
      type: 'announcementPosted',
      data: { postId: postRef.id },
      timestamp: serverTimestamp(),
      readByMemberIds: [user.uid],
    });
    await batch.commit();
    return postRef.id;
  } catch (error) {
    console.error('Error creating post:', error);
    throw error;
  }
};

export const reactToPost = async (
  crewId: string,
  postId: string,
  reaction: ReactionType,
): Promise<void> => {
  try {
    const user = requireCrewUser();
    await updateDoc(doc(postsRef(crewId), postId), {
      [`reactions.${user.uid}`]: reaction,
    });
  } catch (error) {
    console.error('Error reacting to post:', error);
    throw error;
  }
};

export const removeReaction = async (crewId: string, postId: string): Promise<void> => {
  try {
    const user = requireCrewUser();
    await updateDoc(doc(postsRef(crewId), postId), {
      [`reactions.${user.uid}`]: deleteField(),
    });
  } catch (error) {
    console.error('Error removing reaction:', error);
    throw error;
  }
};

/**
 * Append a comment to a post. Returns the comment id.
 */
export const addComment = async (
  crewId: string,
  postId: string,
  content: string,
): Promise<string> => {
  try {
    const user = requireCrewUser();
    const contentError = validateMessageContent(content);
    if (contentError) {
      throw new CrewError('invalid-argument', contentError);
    }
    const commentId = randomUUID();
    // serverTimestamp() is not allowed inside arrays
    await updateDoc(doc(postsRef(crewId), postId), {
      comments: arrayUnion({
        id: commentId,
        authorId: user.uid,
        content: content.trim(),
        postedAt: Timestamp.now(),
      }),
    });
    return commentId;
  } catch (error) {
    console.error('Error adding comment:', error);
    throw error;
  }
};

/**
 * Pin or unpin a post. Returns the new pinned state.
 */
export const togglePin = async (crewId: string, postId: string): Promise<boolean> => {
  try {
    const user = requireCrewUser();
    const crew = await getCrew(crewId);
    if (!crew) {
      throw new CrewError('not-found', 'Crew not found');
    }
    if (!hasCrewPermission(crew, user.uid, 'postAnnouncements')) {
      throw new CrewError('permission-denied', 'Only crew leaders can pin announcements');
    }
    const postRef = doc(postsRef(crewId), postId);
    const postDoc = await getDoc(postRef);
    if (!postDoc.exists()) {
      throw new CrewError('not-found', 'Post not found');
    }
    const isPinned = !postFromFirestore(postDoc.id, postDoc.data()).isPinned;
    await updateDoc(postRef, { isPinned });
    return isPinned;
  } catch (error) {
    console.error('Error toggling pin:', error);
    throw error;
  }
};

// ============================================================================
// ACTIVITY
// ============================================================================

export const markActivityRead = async (crewId: string, activityIds: string[]): Promise<void> => {
  if (activityIds.length === 0) return;
  try {
    const user = requireCrewUser();
    const batch = writeBatch(db);
    activityIds.forEach((activityId) => {
      batch.update(doc(activityRef(crewId), activityId), {
        readByMemberIds: arrayUnion(user.uid),
      });
    });
    await batch.commit();
  } catch (error) {
    console.error('Error marking activity as read:', error);
    throw error;
  }
};
