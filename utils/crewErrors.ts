// utils/crewErrors.ts

import { showToast } from './toast';

export type CrewErrorCode =
  | 'unauthenticated'
  | 'permission-denied'
  | 'not-found'
  | 'invalid-argument'
  | 'already-exists'
  | 'resource-exhausted'
  | 'unavailable'
  | 'unknown';

export class CrewError extends Error {
  readonly code: CrewErrorCode;

  constructor(code: CrewErrorCode, message: string) {
    super(message);
    this.name = 'CrewError';
    this.code = code;
  }
}

const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : '';
    return `${code} ${error.message}`.toLowerCase();
  }
  return String(error).toLowerCase();
};

/**
 * Map a raw failure to the message shown to the user.
 */
export const getFriendlyErrorMessage = (error: unknown, fallback: string): string => {
  const text = describeError(error);

  if (text.includes('permission') || text.includes('denied')) {
    return 'Permission denied. Please ensure you are a crew member and try again.';
  }
  if (text.includes('unauthenticated') || text.includes('authentication')) {
    return 'Authentication required. Please sign in and try again.';
  }
  if (text.includes('not found') || text.includes('not-found')) {
    return 'Crew not found. The crew may have been deleted.';
  }
  if (text.includes('network') || text.includes('unavailable')) {
    return 'Network error. Please check your connection and try again.';
  }
  if (text.includes('invalid crew id')) {
    return 'Invalid crew. Please navigate back and try again.';
  }
  if (error instanceof CrewError && error.code === 'invalid-argument') {
    return error.message;
  }
  return fallback;
};

export interface CrewActionOptions {
  successMessage?: string;
  errorTitle: string;
  fallbackMessage?: string;
}

/**
 * Run a user-triggered crew action. Failures are logged and shown as an error
 * toast, and the promise resolves to undefined instead of rejecting.
 */
export const runCrewAction = async <T>(
  action: () => Promise<T>,
  { successMessage, errorTitle, fallbackMessage = 'Please try again.' }: CrewActionOptions,
): Promise<T | undefined> => {
  try {
    const result = await action();
    if (successMessage) {
      showToast({ type: 'success', text1: 'Success', text2: successMessage });
    }
    return result;
  } catch (error) {
    console.error(`${errorTitle}:`, error);
    showToast({
      type: 'error',
      text1: errorTitle,
      text2: getFriendlyErrorMessage(error, fallbackMessage),
    });
    return undefined;
  }
};
