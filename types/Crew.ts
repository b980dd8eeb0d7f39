import { CrewPreferences } from './CrewPreferences';

export type MemberRole = 'admin' | 'foreman' | 'lead' | 'member';

export const MEMBER_ROLES: readonly MemberRole[] = ['admin', 'foreman', 'lead', 'member'];

export interface CrewStats {
  totalJobsShared: number;
  totalMessages: number;
  lastActivityAt?: Date;
}

export interface Crew {
  id: string;
  name: string;
  description?: string;
  localNumber?: string; // "Local 123"
  foremanId: string;
  memberIds: string[];
  roles: Record<string, MemberRole>;
  maxMembers: number;
  preferences: CrewPreferences;
  stats: CrewStats;
  isActive: boolean;
  createdAt: Date;
  updatedAt?: Date;
  updatedBy?: string;
}

// What the create-crew form hands to the crew service
export interface NewCrewInput {
  name: string;
  description?: string;
  localNumber?: string;
  maxMembers: number;
}

export type CrewUpdate = Partial<
  Pick<Crew, 'name' | 'description' | 'localNumber' | 'maxMembers' | 'preferences' | 'isActive'>
>;

export const DEFAULT_MAX_MEMBERS = 10;
export const MIN_CREW_MEMBERS = 2;
export const MAX_CREW_MEMBERS = 50;
