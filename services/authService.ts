// services/authService.ts
import { auth } from '../firebase';
import { AuthUser } from '../types/User';
import { CrewError } from '../utils/crewErrors';

export const getCurrentUser = (): AuthUser | null => {
  const user = auth.currentUser;
  if (!user) {
    return null;
  }
  return {
    uid: user.uid,
    email: user.email,
    displayName: user.displayName,
    isAnonymous: user.isAnonymous,
    emailVerified: user.emailVerified,
  };
};

/**
 * The signed-in user, for operations that need a full account. Crews are not
 * available to anonymous sessions.
 */
export const requireCrewUser = (): AuthUser => {
  const user = getCurrentUser();
  if (!user) {
    throw new CrewError('unauthenticated', 'You must be signed in to use crews');
  }
  if (user.isAnonymous) {
    throw new CrewError('permission-denied', 'Sign in with a full account to use crews');
  }
  return user;
};
