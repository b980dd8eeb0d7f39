export type InvitationStatus = 'pending' | 'accepted' | 'declined' | 'expired' | 'cancelled';

export interface CrewInvitation {
  id: string;
  crewId: string;
  crewName: string;
  inviterId: string;
  inviteeId: string;
  message?: string;
  status: InvitationStatus;
  createdAt: Date;
  expiresAt: Date;
}
