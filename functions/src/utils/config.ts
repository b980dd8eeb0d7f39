import { defineInt } from 'firebase-functions/params';

export const DEFAULT_INVITATION_TTL_DAYS = 7;
export const DEFAULT_MAX_CREW_MEMBERS = 50;

const INVITATION_TTL_DAYS = defineInt('INVITATION_TTL_DAYS', {
  default: DEFAULT_INVITATION_TTL_DAYS,
  description: 'Days before a pending crew invitation expires',
});

const MAX_CREW_MEMBERS = defineInt('MAX_CREW_MEMBERS', {
  default: DEFAULT_MAX_CREW_MEMBERS,
  description: 'Upper bound on crew size, whatever a crew\'s own maxMembers says',
});

// Params read as 0 when unset
const positiveOr = (value: number, fallback: number): number =>
  Number.isInteger(value) && value > 0 ? value : fallback;

export const getInvitationTtlDays = (): number =>
  positiveOr(INVITATION_TTL_DAYS.value(), DEFAULT_INVITATION_TTL_DAYS);

export const getMaxCrewMembers = (): number =>
  positiveOr(MAX_CREW_MEMBERS.value(), DEFAULT_MAX_CREW_MEMBERS);
