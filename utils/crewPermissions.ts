// utils/crewPermissions.ts

import { Crew, MemberRole } from '../types/Crew';

export type CrewPermission =
  | 'inviteMembers'
  | 'removeMembers'
  | 'shareJobs'
  | 'postAnnouncements'
  | 'editCrewInfo'
  | 'viewAnalytics'
  | 'manageMembers'
  | 'deleteCrew'
  | 'viewCrew';

export const ALL_CREW_PERMISSIONS: readonly CrewPermission[] = [
  'inviteMembers',
  'removeMembers',
  'shareJobs',
  'postAnnouncements',
  'editCrewInfo',
  'viewAnalytics',
  'manageMembers',
  'deleteCrew',
  'viewCrew',
];

export const ROLE_PERMISSIONS: Record<MemberRole, readonly CrewPermission[]> = {
  admin: ALL_CREW_PERMISSIONS,
  foreman: [
    'inviteMembers',
    'removeMembers',
    'shareJobs',
    'postAnnouncements',
    'editCrewInfo',
    'viewAnalytics',
    'manageMembers',
    'viewCrew',
  ],
  lead: ['inviteMembers', 'shareJobs', 'postAnnouncements', 'viewCrew'],
  member: ['viewCrew'],
};

export const ROLE_DISPLAY_NAMES: Record<MemberRole, string> = {
  admin: 'Admin',
  foreman: 'Foreman',
  lead: 'Lead Journeyman',
  member: 'Crew Member',
};

export const roleHasPermission = (role: MemberRole, permission: CrewPermission): boolean =>
  ROLE_PERMISSIONS[role].includes(permission);

/**
 * Resolve a user's role in a crew. Returns null for non-members.
 */
export const getMemberRole = (
  crew: Pick<Crew, 'foremanId' | 'memberIds' | 'roles'>,
  uid: string,
): MemberRole | null => {
  if (!crew.memberIds.includes(uid) && crew.foremanId !== uid) {
    return null;
  }
  const explicit = crew.roles[uid];
  if (explicit) {
    return explicit;
  }
  return uid === crew.foremanId ? 'foreman' : 'member';
};

export const hasCrewPermission = (
  crew: Pick<Crew, 'foremanId' | 'memberIds' | 'roles'>,
  uid: string,
  permission: CrewPermission,
): boolean => {
  const role = getMemberRole(crew, uid);
  if (!role) {
    return false;
  }
  // The crew's own foreman can always disband it
  if (permission === 'deleteCrew' && uid === crew.foremanId) {
    return true;
  }
  return roleHasPermission(role, permission);
};

export const getGrantedPermissions = (
  crew: Pick<Crew, 'foremanId' | 'memberIds' | 'roles'>,
  uid: string,
): CrewPermission[] => ALL_CREW_PERMISSIONS.filter((permission) => hasCrewPermission(crew, uid, permission));
