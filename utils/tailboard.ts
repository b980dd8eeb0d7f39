// utils/tailboard.ts
// Aggregates what the Tailboard hub shows for one crew: feed, activity, posts and chat.

import { Crew } from '../types/Crew';
import { CrewMessage } from '../types/CrewMessage';
import { ActivityItem, SuggestedJob, TailboardPost } from '../types/Tailboard';
import { CrewMember } from '../types/CrewMember';
import { countUnviewed } from './jobFilters';
import { countOnline } from './memberRoster';

export interface TailboardInput {
  crew: Pick<Crew, 'memberIds'>;
  jobFeed: SuggestedJob[];
  activity: ActivityItem[];
  posts: TailboardPost[];
  messages: CrewMessage[];
  lastReadAt: Date | null;
  uid: string;
  members?: CrewMember[];
}

export interface TailboardSummary {
  memberCount: number;
  onlineMembers: number;
  unviewedJobs: number;
  unreadActivity: number;
  unreadMessages: number;
  posts: TailboardPost[];
  engagementRate: number;
}

/**
 * Messages from other members after lastReadAt. Without a read marker the
 * count is 0, the same as fetchUnreadCount.
 */
export const countUnreadMessages = (messages: CrewMessage[], lastReadAt: Date | null, uid: string): number => {
  if (lastReadAt === null) {
    return 0;
  }
  return messages.filter(
    (message) =>
      !message.isDeleted && message.senderId !== uid && message.createdAt.getTime() > lastReadAt.getTime(),
  ).length;
};

/**
 * Pinned posts first, newest first within each group.
 */
export const orderPosts = (posts: TailboardPost[]): TailboardPost[] =>
  [...posts].sort((a, b) => {
    if (a.isPinned !== b.isPinned) {
      return a.isPinned ? -1 : 1;
    }
    return b.postedAt.getTime() - a.postedAt.getTime();
  });

/**
 * Share of crew members (0-1) who reacted to or commented on a post, or read an activity item.
 */
export const calculateEngagementRate = (
  posts: TailboardPost[],
  activity: ActivityItem[],
  memberIds: string[],
): number => {
  if (memberIds.length === 0) {
    return 0;
  }
  const engaged = new Set<string>();
  for (const post of posts) {
    Object.keys(post.reactions).forEach((uid) => engaged.add(uid));
    post.comments.forEach((comment) => engaged.add(comment.authorId));
  }
  for (const item of activity) {
    item.readByMemberIds.forEach((uid) => engaged.add(uid));
  }
  const engagedMembers = memberIds.filter((uid) => engaged.has(uid)).length;
  return engagedMembers / memberIds.length;
};

export const buildTailboardSummary = ({
  crew,
  jobFeed,
  activity,
  posts,
  messages,
  lastReadAt,
  uid,
  members = [],
}: TailboardInput): TailboardSummary => ({
  memberCount: crew.memberIds.length,
  onlineMembers: countOnline(members),
  unviewedJobs: countUnviewed(jobFeed, uid),
  unreadActivity: activity.filter((item) => !item.readByMemberIds.includes(uid)).length,
  unreadMessages: countUnreadMessages(messages, lastReadAt, uid),
  posts: orderPosts(posts),
  engagementRate: calculateEngagementRate(posts, activity, crew.memberIds),
});
