import { MemberRole } from './Crew';

export type MemberAvailability =
  | 'available'
  | 'busy'
  | 'onJob'
  | 'onVacation'
  | 'sick'
  | 'unavailable'
  | 'offline';

export interface CrewMember {
  userId: string;
  displayName: string;
  role: MemberRole;
  roleLabel: string;
  classification?: string;
  localNumber?: string;
  isOnline: boolean;
  lastSeen?: Date;
  availability: MemberAvailability;
}
