// utils/jobFilters.ts
// Filtering and ordering for a crew's job feed

import { HIGH_MATCH_SCORE, JobFeedFilter, SuggestedJob } from '../types/Tailboard';

export interface JobFeedQuery {
  filter?: JobFeedFilter;
  searchQuery?: string;
  tag?: string | null;
}

const matchesFilter = (job: SuggestedJob, filter: JobFeedFilter, uid: string): boolean => {
  switch (filter) {
    case 'high':
      return job.matchScore >= HIGH_MATCH_SCORE;
    case 'unviewed':
      return !job.viewedByMemberIds.includes(uid);
    case 'applied':
      return job.appliedMemberIds.includes(uid);
    case 'saved':
      return job.savedByMemberIds.includes(uid);
    case 'all':
      return true;
  }
};

export const filterJobFeed = (jobs: SuggestedJob[], jobQuery: JobFeedQuery, uid: string): SuggestedJob[] => {
  const { filter = 'all', searchQuery = '', tag = null } = jobQuery;
  const search = searchQuery.trim().toLowerCase();
  const wantedTag = tag?.trim().toLowerCase() ?? '';

  return jobs.filter((job) => {
    if (
      search &&
      !job.jobTitle.toLowerCase().includes(search) &&
      !job.company.toLowerCase().includes(search)
    ) {
      return false;
    }
    if (wantedTag && !job.tags.some((jobTag) => jobTag.toLowerCase() === wantedTag)) {
      return false;
    }
    return matchesFilter(job, filter, uid);
  });
};

/**
 * Highest score first; among equal scores the newest suggestion wins.
 */
export const sortByMatchScore = (jobs: SuggestedJob[]): SuggestedJob[] =>
  [...jobs].sort((a, b) => {
    if (b.matchScore !== a.matchScore) {
      return b.matchScore - a.matchScore;
    }
    return b.suggestedAt.getTime() - a.suggestedAt.getTime();
  });

export const collectTags = (jobs: SuggestedJob[]): string[] =>
  [...new Set(jobs.flatMap((job) => job.tags))].sort((a, b) => a.localeCompare(b));

export const countUnviewed = (jobs: SuggestedJob[], uid: string): number =>
  jobs.filter((job) => !job.viewedByMemberIds.includes(uid)).length;
