export type JobSuggestionSource = 'aiMatch' | 'memberShare' | 'autoShare' | 'savedSearch';

export type ActivityType =
  | 'memberJoined'
  | 'memberLeft'
  | 'jobShared'
  | 'jobApplied'
  | 'announcementPosted'
  | 'milestoneReached'
  | 'crewCreated'
  | 'safetyAlert';

export type ReactionType = 'like' | 'love' | 'celebrate' | 'thumbsUp' | 'thumbsDown';

export interface SuggestedJob {
  id: string;
  jobId: string;
  jobTitle: string;
  company: string;
  matchScore: number; // 0-100
  matchReasons: string[];
  viewedByMemberIds: string[];
  appliedMemberIds: string[];
  savedByMemberIds: string[];
  tags: string[];
  suggestedAt: Date;
  source: JobSuggestionSource;
  sharedBy?: string;
}

export interface ActivityItem {
  id: string;
  actorId: string;
  type: ActivityType;
  data: Record<string, unknown>;
  timestamp: Date;
  readByMemberIds: string[];
}

export interface PostComment {
  id: string;
  authorId: string;
  content: string;
  postedAt: Date;
  editedAt?: Date;
}

export interface TailboardPost {
  id: string;
  authorId: string;
  content: string;
  attachmentUrls: string[];
  isPinned: boolean;
  reactions: Record<string, ReactionType>;
  comments: PostComment[];
  postedAt: Date;
  editedAt?: Date;
}

export type JobFeedFilter = 'all' | 'high' | 'unviewed' | 'applied' | 'saved';

export const HIGH_MATCH_SCORE = 80;
export const ACTIVITY_PAGE_SIZE = 50;
