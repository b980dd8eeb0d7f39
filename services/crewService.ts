// services/crewService.ts
import {
  arrayRemove,
  arrayUnion,
  collection,
  deleteField,
  doc,
  DocumentData,
  getDoc,
  getDocs,
  onSnapshot,
  query,
  serverTimestamp,
  Unsubscribe,
  where,
  writeBatch,
} from 'firebase/firestore';
import { httpsCallable } from 'firebase/functions';
import { db, functions } from '../firebase';
import { Crew, CrewUpdate, MemberRole, NewCrewInput } from '../types/Crew';
import { CrewPreferences, DEFAULT_CREW_PREFERENCES } from '../types/CrewPreferences';
import { CrewInvitation, InvitationStatus } from '../types/CrewInvitation';
import { CrewError } from '../utils/crewErrors';
import { CrewPermission, hasCrewPermission } from '../utils/crewPermissions';
import {
  getErrorMessages,
  validateCrewMemberOperation,
  validateCrewName,
  validateCrewPreferences,
  validateDescription,
  validateInvitationMessage,
  validateLocalNumber,
  validateMaxMembers,
  ValidationErrors,
} from '../utils/crewValidation';
import { crewFromFirestore, invitationFromFirestore, preferencesToFirestore } from '../utils/firestoreMappers';
import { requireCrewUser } from './authService';

const throwIfInvalid = (errors: ValidationErrors) => {
  const [first] = getErrorMessages(errors);
  if (first) {
    throw new CrewError('invalid-argument', first);
  }
};

const loadCrewOrThrow = async (crewId: string): Promise<Crew> => {
  const crew = await getCrew(crewId);
  if (!crew) {
    throw new CrewError('not-found', 'Crew not found');
  }
  return crew;
};

const requirePermission = (crew: Crew, uid: string, permission: CrewPermission) => {
  if (!hasCrewPermission(crew, uid, permission)) {
    throw new CrewError('permission-denied', `You do not have permission to ${permission} in this crew`);
  }
};

/**
 * Create a crew with the current user as its foreman and only member
 */
export const createCrew = async (
  input: NewCrewInput,
  preferences?: CrewPreferences,
): Promise<Crew> => {
  try {
    const user = requireCrewUser();
    throwIfInvalid({
      name: validateCrewName(input.name),
      description: validateDescription(input.description),
      localNumber: validateLocalNumber(input.localNumber),
      maxMembers: validateMaxMembers(String(input.maxMembers)),
    });
    if (preferences) {
      throwIfInvalid(validateCrewPreferences(preferences));
    }

    const crewPreferences = preferences ?? DEFAULT_CREW_PREFERENCES;
    const crewRef = doc(collection(db, 'crews'));
    const name = input.name.trim();
    const description = input.description?.trim();
    const localNumber = input.localNumber?.trim();

    const batch = writeBatch(db);
    batch.set(crewRef, {
      name,
      ...(description ? { description } : {}),
      ...(localNumber ? { localNumber } : {}),
      foremanId: user.uid,
      memberIds: [user.uid],
      roles: { [user.uid]: 'foreman' },
      maxMembers: input.maxMembers,
      preferences: preferencesToFirestore(crewPreferences),
      stats: { totalJobsShared: 0, totalMessages: 0 },
      isActive: true,
      createdAt: serverTimestamp(),
    });
    batch.set(
      doc(db, 'users', user.uid),
      { crewIds: arrayUnion(crewRef.id) },
      { merge: true },
    );
    await batch.commit();

    return {
      id: crewRef.id,
      name,
      description: description || undefined,
      localNumber: localNumber || undefined,
      foremanId: user.uid,
      memberIds: [user.uid],
      roles: { [user.uid]: 'foreman' },
      maxMembers: input.maxMembers,
      preferences: crewPreferences,
      stats: { totalJobsShared: 0, totalMessages: 0 },
      isActive: true,
      createdAt: new Date(),
    };
  } catch (error) {
    console.error('Error creating crew:', error);
    throw error;
  }
};

/**
 * Update crew information. Requires the editCrewInfo permission.
 */
export const updateCrew = async (crewId: string, changes: CrewUpdate): Promise<void> => {
  try {
    const user = requireCrewUser();
    const crew = await loadCrewOrThrow(crewId);
    requirePermission(crew, user.uid, 'editCrewInfo');

    const errors: ValidationErrors = {};
    if (changes.name !== undefined) errors.name = validateCrewName(changes.name);
    if (changes.description !== undefined) errors.description = validateDescription(changes.description);
    if (changes.localNumber !== undefined) errors.localNumber = validateLocalNumber(changes.localNumber);
    if (changes.maxMembers !== undefined) {
      errors.maxMembers =
        validateMaxMembers(String(changes.maxMembers)) ??
        (changes.maxMembers < crew.memberIds.length
          ? 'Max members cannot be less than the current member count'
          : null);
    }
    throwIfInvalid(errors);
    if (changes.preferences) {
      throwIfInvalid(validateCrewPreferences(changes.preferences));
    }

    const payload: DocumentData = {
      updatedAt: serverTimestamp(),
      updatedBy: user.uid,
    };
    if (changes.name !== undefined) payload.name = changes.name.trim();
    if ('description' in changes) payload.description = changes.description?.trim() || deleteField();
    if ('localNumber' in changes) payload.localNumber = changes.localNumber?.trim() || deleteField();
    if (changes.maxMembers !== undefined) payload.maxMembers = changes.maxMembers;
    if (changes.preferences) payload.preferences = preferencesToFirestore(changes.preferences);
    if (changes.isActive !== undefined) payload.isActive = changes.isActive;

    const batch = writeBatch(db);
    batch.update(doc(db, 'crews', crewId), payload);
    await batch.commit();
  } catch (error) {
    console.error('Error updating crew:', error);
    throw error;
  }
};

export const getCrew = async (crewId: string): Promise<Crew | null> => {
  if (!crewId.trim()) {
    throw new CrewError('invalid-argument', 'Invalid crew ID');
  }
  try {
    const crewDoc = await getDoc(doc(db, 'crews', crewId));
    if (!crewDoc.exists()) {
      return null;
    }
    return crewFromFirestore(crewDoc.id, crewDoc.data());
  } catch (error) {
    console.error('Error fetching crew:', error);
    throw error;
  }
};

const sortByName = (crews: Crew[]) =>
  [...crews].sort((a, b) => a.name.localeCompare(b.name));

/**
 * Active crews the user belongs to, alphabetically
 */
export const getUserCrews = async (uid: string): Promise<Crew[]> => {
  try {
    const crewsQuery = query(collection(db, 'crews'), where('memberIds', 'array-contains', uid));
    const snapshot = await getDocs(crewsQuery);
    const crews = snapshot.docs
      .map((crewDoc) => crewFromFirestore(crewDoc.id, crewDoc.data()))
      .filter((crew) => crew.isActive);
    return sortByName(crews);
  } catch (error) {
    console.error('Error fetching user crews:', error);
    throw error;
  }
};

export const hasPermission = async (
  crewId: string,
  uid: string,
  permission: CrewPermission,
): Promise<boolean> => {
  const crew = await getCrew(crewId);
  return crew ? hasCrewPermission(crew, uid, permission) : false;
};

// ============================================================================
// INVITATIONS (Cloud Functions)
// ============================================================================

interface InviteToCrewRequest {
  crewId: string;
  inviteeId: string;
  message?: string;
}

interface InviteToCrewResponse {
  invitationId: string;
}

interface RespondToInvitationRequest {
  invitationId: string;
  accept: boolean;
}

export interface RespondToInvitationResponse {
  crewId: string;
  status: InvitationStatus;
}

export const inviteMember = async (
  crewId: string,
  inviteeId: string,
  message?: string,
): Promise<string> => {
  try {
    requireCrewUser();
    throwIfInvalid({ message: validateInvitationMessage(message) });
    const inviteToCrew = httpsCallable<InviteToCrewRequest, InviteToCrewResponse>(
      functions,
      'inviteToCrew',
    );
    const trimmed = message?.trim();
    const result = await inviteToCrew({
      crewId,
      inviteeId,
      ...(trimmed ? { message: trimmed } : {}),
    });
    return result.data.invitationId;
  } catch (error) {
    console.error('Error inviting crew member:', error);
    throw error;
  }
};

export const respondToInvitation = async (
  invitationId: string,
  accept: boolean,
): Promise<RespondToInvitationResponse> => {
  try {
    requireCrewUser();
    const respond = httpsCallable<RespondToInvitationRequest, RespondToInvitationResponse>(
      functions,
      'respondToInvitation',
    );
    const result = await respond({ invitationId, accept });
    return result.data;
  } catch (error) {
    console.error('Error responding to crew invitation:', error);
    throw error;
  }
};

interface CancelInvitationRequest {
  invitationId: string;
}

interface CancelInvitationResponse {
  success: boolean;
}

/**
 * Withdraw an invitation the current user sent.
 */
export const cancelInvitation = async (invitationId: string): Promise<void> => {
  try {
    requireCrewUser();
    const cancel = httpsCallable<CancelInvitationRequest, CancelInvitationResponse>(
      functions,
      'cancelInvitation',
    );
    await cancel({ invitationId });
  } catch (error) {
    console.error('Error cancelling crew invitation:', error);
    throw error;
  }
};

const newestFirst = (invitations: CrewInvitation[]) =>
  [...invitations].sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());

/**
 * Subscribe to the invitations waiting for the user's answer, newest first.
 * Invitations past their expiry are left out before the cleanup job marks them.
 */
export const listenToPendingInvitations = (
  uid: string,
  onChange: (invitations: CrewInvitation[]) => void,
  onError?: (error: Error) => void,
): Unsubscribe => {
  const invitationsQuery = query(
    collection(db, 'crewInvitations'),
    where('inviteeId', '==', uid),
    where('status', '==', 'pending'),
  );
  return onSnapshot(
    invitationsQuery,
    (snapshot) => {
      const now = Date.now();
      const invitations = snapshot.docs
        .map((invitationDoc) => invitationFromFirestore(invitationDoc.id, invitationDoc.data()))
        .filter((invitation) => invitation.expiresAt.getTime() > now);
      onChange(newestFirst(invitations));
    },
    (error) => {
      console.error('Error listening to crew invitations:', error);
      onError?.(error);
    },
  );
};

/**
 * Invitations the current user has sent, in any status, newest first.
 */
export const getSentInvitations = async (): Promise<CrewInvitation[]> => {
  try {
    const user = requireCrewUser();
    const snapshot = await getDocs(
      query(collection(db, 'crewInvitations'), where('inviterId', '==', user.uid)),
    );
    return newestFirst(
      snapshot.docs.map((invitationDoc) => invitationFromFirestore(invitationDoc.id, invitationDoc.data())),
    );
  } catch (error) {
    console.error('Error fetching sent invitations:', error);
    throw error;
  }
};

// ============================================================================
// MEMBERSHIP
// ============================================================================

const commitMemberRemoval = async (crewId: string, memberId: string, actorId: string) => {
  const batch = writeBatch(db);
  batch.update(doc(db, 'crews', crewId), {
    memberIds: arrayRemove(memberId),
    [`roles.${memberId}`]: deleteField(),
    updatedAt: serverTimestamp(),
    updatedBy: actorId,
  });
  batch.set(doc(db, 'users', memberId), { crewIds: arrayRemove(crewId) }, { merge: true });
  await batch.commit();
};

export const removeMember = async (crewId: string, memberId: string): Promise<void> => {
  try {
    const user = requireCrewUser();
    const crew = await loadCrewOrThrow(crewId);
    requirePermission(crew, user.uid, 'removeMembers');
    throwIfInvalid({ member: validateCrewMemberOperation(crew, memberId, 'remove') });
    await commitMemberRemoval(crewId, memberId, user.uid);
  } catch (error) {
    console.error('Error removing crew member:', error);
    throw error;
  }
};

export const leaveCrew = async (crewId: string): Promise<void> => {
  try {
    const user = requireCrewUser();
    const crew = await loadCrewOrThrow(crewId);
    if (crew.foremanId === user.uid) {
      throw new CrewError(
        'invalid-argument',
        'Foreman cannot leave crew. Transfer or delete crew first.',
      );
    }
    if (!crew.memberIds.includes(user.uid)) {
      throw new CrewError('invalid-argument', 'User is not a member of this crew');
    }
    await commitMemberRemoval(crewId, user.uid, user.uid);
  } catch (error) {
    console.error('Error leaving crew:', error);
    throw error;
  }
};

/**
 * Change a member's role. Assigning 'foreman' transfers the crew: only the
 * current foreman can do that, and they step down to lead.
 */
export const setMemberRole = async (
  crewId: string,
  memberId: string,
  role: MemberRole,
): Promise<void> => {
  try {
    const user = requireCrewUser();
    const crew = await loadCrewOrThrow(crewId);
    requirePermission(crew, user.uid, 'manageMembers');

    const batch = writeBatch(db);
    const crewRef = doc(db, 'crews', crewId);

    if (role === 'foreman') {
      if (crew.foremanId !== user.uid) {
        throw new CrewError('permission-denied', 'Only the foreman can transfer the crew');
      }
      throwIfInvalid({ member: validateCrewMemberOperation(crew, memberId, 'transfer') });
      batch.update(crewRef, {
        foremanId: memberId,
        [`roles.${memberId}`]: 'foreman',
        [`roles.${crew.foremanId}`]: 'lead',
        updatedAt: serverTimestamp(),
        updatedBy: user.uid,
      });
    } else {
      if (memberId === crew.foremanId) {
        throw new CrewError('invalid-argument', "Cannot change the crew foreman's role");
      }
      if (!crew.memberIds.includes(memberId)) {
        throw new CrewError('invalid-argument', 'User is not a member of this crew');
      }
      batch.update(crewRef, {
        [`roles.${memberId}`]: role,
        updatedAt: serverTimestamp(),
        updatedBy: user.uid,
      });
    }
    await batch.commit();
  } catch (error) {
    console.error('Error setting member role:', error);
    throw error;
  }
};

export const deleteCrew = async (crewId: string): Promise<void> => {
  try {
    requireCrewUser();
    const callDeleteCrew = httpsCallable<{ crewId: string }, { success: boolean }>(
      functions,
      'deleteCrew',
    );
    await callDeleteCrew({ crewId });
  } catch (error) {
    console.error('Error deleting crew:', error);
    throw error;
  }
};

/**
 * Subscribe to the user's active crews. Returns the unsubscribe function.
 */
export const listenToUserCrews = (
  uid: string,
  onChange: (crews: Crew[]) => void,
  onError?: (error: Error) => void,
): Unsubscribe => {
  const crewsQuery = query(collection(db, 'crews'), where('memberIds', 'array-contains', uid));
  return onSnapshot(
    crewsQuery,
    (snapshot) => {
      const crews = snapshot.docs
        .map((crewDoc) => crewFromFirestore(crewDoc.id, crewDoc.data()))
        .filter((crew) => crew.isActive);
      onChange(sortByName(crews));
    },
    (error) => {
      console.error('Error listening to user crews:', error);
      onError?.(error);
    },
  );
};
