export * from './types/Crew';
export * from './types/CrewInvitation';
export * from './types/CrewMember';
export * from './types/CrewMessage';
export * from './types/CrewPreferences';
export * from './types/Job';
export * from './types/NotificationSettings';
export * from './types/Tailboard';
export * from './types/User';

export * from './utils/crewErrors';
export * from './utils/crewPermissions';
export * from './utils/crewValidation';
export * from './utils/firestoreMappers';
export * from './utils/jobFilters';
export * from './utils/jobMatching';
export * from './utils/memberRoster';
export * from './utils/tailboard';
export * from './utils/toast';

export * from './services/authService';
export * from './services/crewChatService';
export * from './services/crewService';
export * from './services/jobSharingService';
export * from './services/presenceService';
export * from './services/tailboardService';

export { loadConfig } from './config';
export type { AppConfig, FirebaseWebConfig } from './config';
