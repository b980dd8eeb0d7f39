// utils/crewValidation.ts
// Form and operation validation for crews, crew preferences, messages and invitations.
// Every validator returns an error message, or null when the value is valid.

import { Crew, MAX_CREW_MEMBERS, MIN_CREW_MEMBERS, NewCrewInput } from '../types/Crew';
import { CrewPreferences } from '../types/CrewPreferences';

export type ValidationErrors = Record<string, string | null>;

export const MIN_CREW_NAME_LENGTH = 3;
export const MAX_CREW_NAME_LENGTH = 50;
export const MAX_DESCRIPTION_LENGTH = 500;
export const MAX_MESSAGE_CONTENT_LENGTH = 1000;
export const MAX_INVITATION_MESSAGE_LENGTH = 500;

const LOCAL_NUMBER_PATTERN = /^Local \d+$/;
const HARMFUL_CONTENT_PATTERN = /<script|javascript:|data:/i;
const DIGITS_ONLY = /^\d+$/;

// ============================================================================
// CREW FIELDS
// ============================================================================

export const validateCrewName = (name: string | undefined): string | null => {
  const trimmed = name?.trim() ?? '';
  if (trimmed.length === 0) {
    return 'Crew name is required';
  }
  if (trimmed.length < MIN_CREW_NAME_LENGTH) {
    return `Crew name must be at least ${MIN_CREW_NAME_LENGTH} characters`;
  }
  if (trimmed.length > MAX_CREW_NAME_LENGTH) {
    return `Crew name must be less than ${MAX_CREW_NAME_LENGTH} characters`;
  }
  return null;
};

/**
 * Max members comes straight from a text field, so it is validated as a string.
 */
export const validateMaxMembers = (value: string | undefined): string | null => {
  const trimmed = value?.trim() ?? '';
  if (trimmed.length === 0) {
    return 'Max members is required';
  }
  if (!DIGITS_ONLY.test(trimmed)) {
    return 'Max members must be a whole number';
  }
  const parsed = Number(trimmed);
  if (parsed < MIN_CREW_MEMBERS || parsed > MAX_CREW_MEMBERS) {
    return `Max members must be between ${MIN_CREW_MEMBERS} and ${MAX_CREW_MEMBERS}`;
  }
  return null;
};

export const validateLocalNumber = (value: string | undefined): string | null => {
  const trimmed = value?.trim() ?? '';
  if (trimmed.length === 0) {
    return null;
  }
  if (!LOCAL_NUMBER_PATTERN.test(trimmed)) {
    return 'Local must be in the format "Local 123"';
  }
  return null;
};

export const validateDescription = (value: string | undefined): string | null => {
  const trimmed = value?.trim() ?? '';
  if (trimmed.length > MAX_DESCRIPTION_LENGTH) {
    return `Description must be less than ${MAX_DESCRIPTION_LENGTH} characters`;
  }
  return null;
};

// ============================================================================
// CREW PREFERENCES
// ============================================================================

export const validateCrewPreferences = (preferences: CrewPreferences): ValidationErrors => {
  const errors: ValidationErrors = {
    jobTypes: preferences.jobTypes.length === 0 ? 'Please select at least one job classification' : null,
    constructionTypes:
      preferences.constructionTypes.length === 0 ? 'Please select at least one construction type' : null,
    minHourlyRate: null,
    maxDistanceMiles: null,
    matchThreshold: null,
  };

  if (preferences.minHourlyRate !== undefined && !(preferences.minHourlyRate >= 0)) {
    errors.minHourlyRate = 'Please enter a valid hourly rate';
  }
  if (
    preferences.maxDistanceMiles !== undefined &&
    !(Number.isInteger(preferences.maxDistanceMiles) && preferences.maxDistanceMiles >= 0)
  ) {
    errors.maxDistanceMiles = 'Please enter a valid distance';
  }
  if (
    !Number.isInteger(preferences.matchThreshold) ||
    preferences.matchThreshold < 0 ||
    preferences.matchThreshold > 100
  ) {
    errors.matchThreshold = 'Match threshold must be between 0 and 100';
  }
  return errors;
};

// ============================================================================
// MESSAGES & INVITATIONS
// ============================================================================

export const validateMessageContent = (content: string | undefined): string | null => {
  const trimmed = content?.trim() ?? '';
  if (trimmed.length === 0) {
    return 'Message content is required';
  }
  if (trimmed.length > MAX_MESSAGE_CONTENT_LENGTH) {
    return `Message must be less than ${MAX_MESSAGE_CONTENT_LENGTH} characters`;
  }
  if (HARMFUL_CONTENT_PATTERN.test(trimmed)) {
    return 'Message contains potentially harmful content';
  }
  return null;
};

export const validateInvitationMessage = (message: string | undefined): string | null => {
  const trimmed = message?.trim() ?? '';
  if (trimmed.length === 0) {
    return null;
  }
  if (trimmed.length > MAX_INVITATION_MESSAGE_LENGTH) {
    return `Invitation message must be less than ${MAX_INVITATION_MESSAGE_LENGTH} characters`;
  }
  if (HARMFUL_CONTENT_PATTERN.test(trimmed)) {
    return 'Invitation message contains potentially harmful content';
  }
  return null;
};

// ============================================================================
// MEMBER OPERATIONS
// ============================================================================

export type MemberOperation = 'add' | 'remove' | 'transfer';

export const validateCrewMemberOperation = (
  crew: Pick<Crew, 'foremanId' | 'memberIds' | 'maxMembers'>,
  memberId: string,
  operation: MemberOperation,
): string | null => {
  if (!memberId.trim()) {
    return 'Member is required';
  }
  const isMember = crew.memberIds.includes(memberId);

  switch (operation) {
    case 'add':
      if (isMember) {
        return 'User is already a member of this crew';
      }
      if (crew.memberIds.length >= crew.maxMembers) {
        return 'This crew is full';
      }
      return null;
    case 'remove':
      if (memberId === crew.foremanId) {
        return 'Cannot remove the crew foreman';
      }
      if (!isMember) {
        return 'User is not a member of this crew';
      }
      return null;
    case 'transfer':
      if (memberId === crew.foremanId) {
        return 'Cannot transfer foreman role to yourself';
      }
      if (!isMember) {
        return 'User must be a member of the crew to become foreman';
      }
      return null;
  }
};

// ============================================================================
// CREATE CREW FORM
// ============================================================================

export interface CreateCrewFormValues {
  name: string;
  description?: string;
  localNumber?: string;
  maxMembers: string;
}

export type CreateCrewFormResult =
  | { ok: true; input: NewCrewInput }
  | { ok: false; errors: ValidationErrors };

export const validateCreateCrewForm = (values: CreateCrewFormValues): ValidationErrors => ({
  name: validateCrewName(values.name),
  description: validateDescription(values.description),
  localNumber: validateLocalNumber(values.localNumber),
  maxMembers: validateMaxMembers(values.maxMembers),
});

export const parseCreateCrewForm = (values: CreateCrewFormValues): CreateCrewFormResult => {
  const errors = validateCreateCrewForm(values);
  if (!isValid(errors)) {
    return { ok: false, errors };
  }

  const description = values.description?.trim();
  const localNumber = values.localNumber?.trim();
  return {
    ok: true,
    input: {
      name: values.name.trim(),
      description: description ? description : undefined,
      localNumber: localNumber ? localNumber : undefined,
      maxMembers: Number(values.maxMembers.trim()),
    },
  };
};

// ============================================================================
// RESULT HELPERS
// ============================================================================

export const isValid = (errors: ValidationErrors): boolean =>
  Object.values(errors).every((error) => error === null);

export const getErrorMessages = (errors: ValidationErrors): string[] =>
  Object.values(errors).filter((error): error is string => error !== null);
