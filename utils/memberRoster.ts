// utils/memberRoster.ts

import moment from 'moment';
import { Crew } from '../types/Crew';
import { CrewMember } from '../types/CrewMember';
import { User } from '../types/User';
import { getMemberRole, ROLE_DISPLAY_NAMES } from './crewPermissions';

/**
 * Online members first, then alphabetical by display name. Never mutates the input.
 */
export const sortMembers = (members: CrewMember[]): CrewMember[] =>
  [...members].sort((a, b) => {
    if (a.isOnline !== b.isOnline) {
      return a.isOnline ? -1 : 1;
    }
    return a.displayName.localeCompare(b.displayName, undefined, { sensitivity: 'base' });
  });

export const countOnline = (members: CrewMember[]): number =>
  members.filter((member) => member.isOnline).length;

export const lastActiveLabel = (member: CrewMember, now: Date = new Date()): string | null => {
  if (member.isOnline) {
    return 'Online';
  }
  if (!member.lastSeen) {
    return null;
  }
  return moment(member.lastSeen).from(moment(now));
};

export const buildRoster = (
  crew: Pick<Crew, 'foremanId' | 'memberIds' | 'roles'>,
  users: User[],
  currentUid: string,
): CrewMember[] => {
  const usersById = new Map(users.map((user) => [user.uid, user]));

  return crew.memberIds.map((memberId) => {
    const user = usersById.get(memberId);
    const isOnline = user?.isOnline ?? false;
    const role = getMemberRole(crew, memberId) ?? 'member';
    return {
      userId: memberId,
      displayName: memberId === currentUid ? 'You' : user?.displayName ?? 'Crew Member',
      role,
      roleLabel: ROLE_DISPLAY_NAMES[role],
      classification: user?.classification,
      localNumber: user?.homeLocal,
      isOnline,
      lastSeen: user?.lastSeen,
      availability: isOnline ? 'available' : 'offline',
    };
  });
};
