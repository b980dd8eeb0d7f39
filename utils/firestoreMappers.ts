// utils/firestoreMappers.ts
// Turn raw Firestore document data into typed models. Every field is narrowed
// and defaulted.

import { Crew, CrewStats, DEFAULT_MAX_MEMBERS, MEMBER_ROLES, MemberRole } from '../types/Crew';
import { CrewPreferences, DEFAULT_CREW_PREFERENCES } from '../types/CrewPreferences';
import { CrewMessage, CrewMessageType } from '../types/CrewMessage';
import { CrewInvitation, InvitationStatus } from '../types/CrewInvitation';
import { Job } from '../types/Job';
import {
  ActivityItem,
  ActivityType,
  JobSuggestionSource,
  PostComment,
  ReactionType,
  SuggestedJob,
  TailboardPost,
} from '../types/Tailboard';
import { User } from '../types/User';
import { DEFAULT_NOTIFICATION_SETTINGS, NotificationSettings } from '../types/NotificationSettings';

type RawData = Record<string, unknown>;

// ============================================================================
// FIELD HELPERS
// ============================================================================

export const asString = (value: unknown, fallback = ''): string =>
  typeof value === 'string' ? value : fallback;

export const asOptionalString = (value: unknown): string | undefined =>
  typeof value === 'string' && value.length > 0 ? value : undefined;

export const asNumber = (value: unknown, fallback = 0): number =>
  typeof value === 'number' && Number.isFinite(value) ? value : fallback;

export const asOptionalNumber = (value: unknown): number | undefined =>
  typeof value === 'number' && Number.isFinite(value) ? value : undefined;

export const asBoolean = (value: unknown, fallback = false): boolean =>
  typeof value === 'boolean' ? value : fallback;

export const asStringArray = (value: unknown): string[] =>
  Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];

export const asRecord = (value: unknown): RawData => {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return {};
  }
  return Object.fromEntries(Object.entries(value));
};

/**
 * Accepts a Firestore Timestamp (anything with toDate), a Date, an ISO string
 * or epoch millis.
 */
export const asOptionalDate = (value: unknown): Date | undefined => {
  if (value instanceof Date) {
    return value;
  }
  if (typeof value === 'object' && value !== null && 'toDate' in value && typeof value.toDate === 'function') {
    const converted: unknown = value.toDate();
    return converted instanceof Date ? converted : undefined;
  }
  if (typeof value === 'string' || typeof value === 'number') {
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? undefined : parsed;
  }
  return undefined;
};

export const asDate = (value: unknown, fallback: Date = new Date(0)): Date =>
  asOptionalDate(value) ?? fallback;

/**
 * For fields written with serverTimestamp(). A local write that the server
 * has not acknowledged yet reads as null, so it counts as now.
 */
export const asServerDate = (value: unknown): Date => asOptionalDate(value) ?? new Date();

const oneOf = <T extends string>(value: unknown, allowed: readonly T[], fallback: T): T => {
  const match = allowed.find((candidate) => candidate === value);
  return match ?? fallback;
};

// ============================================================================
// MODEL MAPPERS
// ============================================================================

const MESSAGE_TYPES: readonly CrewMessageType[] = [
  'text',
  'system',
  'jobShare',
  'safetyAlert',
  'emergency',
  'weatherAlert',
  'location',
  'image',
];
const SUGGESTION_SOURCES: readonly JobSuggestionSource[] = ['aiMatch', 'memberShare', 'autoShare', 'savedSearch'];
const ACTIVITY_TYPES: readonly ActivityType[] = [
  'memberJoined',
  'memberLeft',
  'jobShared',
  'jobApplied',
  'announcementPosted',
  'milestoneReached',
  'crewCreated',
  'safetyAlert',
];
const REACTION_TYPES: readonly ReactionType[] = ['like', 'love', 'celebrate', 'thumbsUp', 'thumbsDown'];
const INVITATION_STATUSES: readonly InvitationStatus[] = ['pending', 'accepted', 'declined', 'expired', 'cancelled'];

export const preferencesFromFirestore = (value: unknown): CrewPreferences => {
  const data = asRecord(value);
  return {
    jobTypes: asStringArray(data.jobTypes),
    constructionTypes: asStringArray(data.constructionTypes),
    minHourlyRate: asOptionalNumber(data.minHourlyRate),
    maxDistanceMiles: asOptionalNumber(data.maxDistanceMiles),
    preferredCompanies: asStringArray(data.preferredCompanies),
    requiredSkills: asStringArray(data.requiredSkills),
    autoShareEnabled: asBoolean(data.autoShareEnabled, DEFAULT_CREW_PREFERENCES.autoShareEnabled),
    matchThreshold: asNumber(data.matchThreshold, DEFAULT_CREW_PREFERENCES.matchThreshold),
  };
};

/**
 * Firestore rejects undefined field values, so optional preferences are
 * dropped rather than written as undefined.
 */
export const preferencesToFirestore = (preferences: CrewPreferences): RawData => {
  const data: RawData = {
    jobTypes: preferences.jobTypes,
    constructionTypes: preferences.constructionTypes,
    preferredCompanies: preferences.preferredCompanies,
    requiredSkills: preferences.requiredSkills,
    autoShareEnabled: preferences.autoShareEnabled,
    matchThreshold: preferences.matchThreshold,
  };
  if (preferences.minHourlyRate !== undefined) data.minHourlyRate = preferences.minHourlyRate;
  if (preferences.maxDistanceMiles !== undefined) data.maxDistanceMiles = preferences.maxDistanceMiles;
  return data;
};

const statsFromFirestore = (value: unknown): CrewStats => {
  const data = asRecord(value);
  return {
    totalJobsShared: asNumber(data.totalJobsShared),
    totalMessages: asNumber(data.totalMessages),
    lastActivityAt: asOptionalDate(data.lastActivityAt),
  };
};

const rolesFromFirestore = (value: unknown): Record<string, MemberRole> => {
  const roles: Record<string, MemberRole> = {};
  for (const [uid, role] of Object.entries(asRecord(value))) {
    const match = MEMBER_ROLES.find((candidate) => candidate === role);
    if (match) {
      roles[uid] = match;
    }
  }
  return roles;
};

export const crewFromFirestore = (id: string, data: RawData): Crew => ({
  id,
  name: asString(data.name),
  description: asOptionalString(data.description),
  localNumber: asOptionalString(data.localNumber),
  foremanId: asString(data.foremanId),
  memberIds: asStringArray(data.memberIds),
  roles: rolesFromFirestore(data.roles),
  maxMembers: asNumber(data.maxMembers, DEFAULT_MAX_MEMBERS),
  preferences: preferencesFromFirestore(data.preferences),
  stats: statsFromFirestore(data.stats),
  isActive: asBoolean(data.isActive, true),
  createdAt: asServerDate(data.createdAt),
  updatedAt: asOptionalDate(data.updatedAt),
  updatedBy: asOptionalString(data.updatedBy),
});

export const jobFromFirestore = (id: string, data: RawData): Job => ({
  id,
  jobTitle: asString(data.jobTitle, 'Untitled job'),
  company: asString(data.company),
  localNumber: asOptionalString(data.localNumber),
  classification: asOptionalString(data.classification),
  constructionType: asOptionalString(data.constructionType),
  hourlyRate: asOptionalNumber(data.hourlyRate),
  distanceMiles: asOptionalNumber(data.distanceMiles),
  tags: asStringArray(data.tags),
  postedAt: asOptionalDate(data.postedAt),
});

export const suggestedJobFromFirestore = (id: string, data: RawData): SuggestedJob => ({
  id,
  jobId: asString(data.jobId),
  jobTitle: asString(data.jobTitle, 'Untitled job'),
  company: asString(data.company),
  matchScore: asNumber(data.matchScore),
  matchReasons: asStringArray(data.matchReasons),
  viewedByMemberIds: asStringArray(data.viewedByMemberIds),
  appliedMemberIds: asStringArray(data.appliedMemberIds),
  savedByMemberIds: asStringArray(data.savedByMemberIds),
  tags: asStringArray(data.tags),
  suggestedAt: asServerDate(data.suggestedAt),
  source: oneOf(data.source, SUGGESTION_SOURCES, 'aiMatch'),
  sharedBy: asOptionalString(data.sharedBy),
});

export const activityFromFirestore = (id: string, data: RawData): ActivityItem => ({
  id,
  actorId: asString(data.actorId),
  type: oneOf(data.type, ACTIVITY_TYPES, 'memberJoined'),
  data: asRecord(data.data),
  timestamp: asServerDate(data.timestamp),
  readByMemberIds: asStringArray(data.readByMemberIds),
});

const commentFromFirestore = (value: unknown): PostComment => {
  const data = asRecord(value);
  return {
    id: asString(data.id),
    authorId: asString(data.authorId),
    content: asString(data.content),
    postedAt: asDate(data.postedAt),
    editedAt: asOptionalDate(data.editedAt),
  };
};

export const postFromFirestore = (id: string, data: RawData): TailboardPost => {
  const reactions: Record<string, ReactionType> = {};
  for (const [uid, reaction] of Object.entries(asRecord(data.reactions))) {
    reactions[uid] = oneOf(reaction, REACTION_TYPES, 'like');
  }
  return {
    id,
    authorId: asString(data.authorId),
    content: asString(data.content),
    attachmentUrls: asStringArray(data.attachmentUrls),
    isPinned: asBoolean(data.isPinned),
    reactions,
    comments: Array.isArray(data.comments) ? data.comments.map(commentFromFirestore) : [],
    postedAt: asServerDate(data.postedAt),
    editedAt: asOptionalDate(data.editedAt),
  };
};

export const messageFromFirestore = (crewId: string, id: string, data: RawData): CrewMessage => {
  const reactions: Record<string, string> = {};
  for (const [uid, emoji] of Object.entries(asRecord(data.reactions))) {
    if (typeof emoji === 'string') reactions[uid] = emoji;
  }
  const metadata = asRecord(data.metadata);
  return {
    id,
    crewId,
    senderId: asString(data.senderId),
    senderName: asOptionalString(data.senderName),
    text: asString(data.text),
    type: oneOf(data.type, MESSAGE_TYPES, 'text'),
    metadata: Object.keys(metadata).length > 0 ? metadata : undefined,
    reactions,
    createdAt: asServerDate(data.createdAt),
    editedAt: asOptionalDate(data.editedAt),
    isDeleted: asBoolean(data.isDeleted),
  };
};

export const invitationFromFirestore = (id: string, data: RawData): CrewInvitation => ({
  id,
  crewId: asString(data.crewId),
  crewName: asString(data.crewName),
  inviterId: asString(data.inviterId),
  inviteeId: asString(data.inviteeId),
  message: asOptionalString(data.message),
  status: oneOf(data.status, INVITATION_STATUSES, 'pending'),
  createdAt: asServerDate(data.createdAt),
  expiresAt: asDate(data.expiresAt),
});

const notificationSettingsFromFirestore = (value: unknown): NotificationSettings | undefined => {
  if (typeof value !== 'object' || value === null) {
    return undefined;
  }
  const data = asRecord(value);
  return {
    crewMessages: asBoolean(data.crewMessages, DEFAULT_NOTIFICATION_SETTINGS.crewMessages),
    safetyAlerts: asBoolean(data.safetyAlerts, DEFAULT_NOTIFICATION_SETTINGS.safetyAlerts),
    jobSharing: asBoolean(data.jobSharing, DEFAULT_NOTIFICATION_SETTINGS.jobSharing),
    crewManagement: asBoolean(data.crewManagement, DEFAULT_NOTIFICATION_SETTINGS.crewManagement),
  };
};

export const userFromFirestore = (uid: string, data: RawData): User => ({
  uid,
  displayName: asString(data.displayName, 'Unknown User'),
  email: asString(data.email),
  homeLocal: asOptionalString(data.homeLocal),
  classification: asOptionalString(data.classification),
  isOnline: asBoolean(data.isOnline),
  lastSeen: asOptionalDate(data.lastSeen),
  expoPushToken: asOptionalString(data.expoPushToken),
  activeChats: asStringArray(data.activeChats),
  crewIds: asStringArray(data.crewIds),
  notificationSettings: notificationSettingsFromFirestore(data.notificationSettings),
});
