jest.mock('firebase/firestore', () =>
  jest.requireActual<typeof import('./helpers/fakeFirestore')>('./helpers/fakeFirestore').createFakeFirestoreModule()
);
jest.mock('../../firebase', () => ({ db: {}, auth: { currentUser: null }, functions: {} }));

import { getCurrentUser, requireCrewUser } from '../authService';
import { CrewError } from '../../utils/crewErrors';
import { signIn, signOut } from './helpers/fakeFirestore';

describe('authService', () => {
  beforeEach(() => {
    signOut();
  });

  it('should return null when nobody is signed in', () => {
    expect(getCurrentUser()).toBeNull();
  });

  it('should map the signed-in account', () => {
    signIn('u1', { displayName: 'Sam' });

    expect(getCurrentUser()).toEqual({
      uid: 'u1',
      email: 'u1@example.com',
      displayName: 'Sam',
      isAnonymous: false,
      emailVerified: true,
    });
  });

  it('should reject missing and anonymous users for crew operations', () => {
    expect(() => requireCrewUser()).toThrow(new CrewError('unauthenticated', 'You must be signed in to use crews'));

    signIn('guest', { isAnonymous: true });
    expect(() => requireCrewUser()).toThrow('Sign in with a full account to use crews');
  });

  it('should return a full account', () => {
    signIn('u1');

    expect(requireCrewUser().uid).toBe('u1');
  });
});
