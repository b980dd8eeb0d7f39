import * as admin from 'firebase-admin';
import { notifyCrewMembersOnNewMessage } from './notifications/notifyCrewMembersOnNewMessage';
import { notifyCrewMembersOnJobShared } from './notifications/notifyCrewMembersOnJobShared';
import { notifyCrewOnMembershipChange } from './notifications/notifyCrewOnMembershipChange';
import { notifyUserOnCrewInvitation } from './notifications/notifyUserOnCrewInvitation';
import { notifyInviterOnInvitationResponse } from './notifications/notifyInviterOnInvitationResponse';
import { onCrewCreated } from './crews/onCrewCreated';
import { inviteToCrew } from './crews/inviteToCrew';
import { respondToInvitation } from './crews/respondToInvitation';
import { cancelInvitation } from './crews/cancelInvitation';
import { deleteCrew } from './crews/deleteCrew';
import { cleanupExpiredInvitations } from './crews/cleanupExpiredInvitations';

export {
  notifyCrewMembersOnNewMessage,
  notifyCrewMembersOnJobShared,
  notifyCrewOnMembershipChange,
  notifyUserOnCrewInvitation,
  notifyInviterOnInvitationResponse,
  onCrewCreated,
  inviteToCrew,
  respondToInvitation,
  cancelInvitation,
  deleteCrew,
  cleanupExpiredInvitations,
};

// Initialize Firebase Admin SDK
admin.initializeApp();
