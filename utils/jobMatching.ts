// utils/jobMatching.ts

import { Job } from '../types/Job';
import { CrewPreferences } from '../types/CrewPreferences';

export interface MatchResult {
  score: number; // 0-100
  reasons: string[];
}

export const MATCH_WEIGHTS = {
  jobType: 30,
  constructionType: 20,
  pay: 20,
  distance: 15,
  company: 15,
} as const;

const includesIgnoreCase = (list: string[], value: string): boolean => {
  const needle = value.trim().toLowerCase();
  return list.some((item) => item.trim().toLowerCase() === needle);
};

/**
 * Score a job against a crew's preferences. A job field that is unknown
 * earns nothing for its criterion.
 */
export const calculateMatchScore = (job: Job, preferences: CrewPreferences): MatchResult => {
  let score = 0;
  const reasons: string[] = [];

  if (job.classification && includesIgnoreCase(preferences.jobTypes, job.classification)) {
    score += MATCH_WEIGHTS.jobType;
    reasons.push(`Matches ${job.classification}`);
  }

  if (job.constructionType && includesIgnoreCase(preferences.constructionTypes, job.constructionType)) {
    score += MATCH_WEIGHTS.constructionType;
    reasons.push(`${job.constructionType} construction`);
  }

  if (
    job.hourlyRate !== undefined &&
    (preferences.minHourlyRate === undefined || job.hourlyRate >= preferences.minHourlyRate)
  ) {
    score += MATCH_WEIGHTS.pay;
    reasons.push(`Pays $${job.hourlyRate.toFixed(2)}/hr`);
  }

  if (
    job.distanceMiles !== undefined &&
    (preferences.maxDistanceMiles === undefined || job.distanceMiles <= preferences.maxDistanceMiles)
  ) {
    score += MATCH_WEIGHTS.distance;
    reasons.push(`${job.distanceMiles} miles away`);
  }

  if (job.company && includesIgnoreCase(preferences.preferredCompanies, job.company)) {
    score += MATCH_WEIGHTS.company;
    reasons.push(`Preferred company: ${job.company}`);
  }

  return { score: Math.min(100, score), reasons };
};

export const shouldAutoShare = (job: Job, preferences: CrewPreferences): boolean =>
  preferences.autoShareEnabled && calculateMatchScore(job, preferences).score >= preferences.matchThreshold;
