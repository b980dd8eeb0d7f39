import { NotificationSettings } from './NotificationSettings';

// The signed-in account as the auth provider reports it
export interface AuthUser {
  uid: string;
  email: string | null;
  displayName: string | null;
  isAnonymous: boolean;
  emailVerified: boolean;
}

// The users/{uid} profile document
export interface User {
  uid: string;
  displayName: string;
  email: string;
  homeLocal?: string;
  classification?: string;
  isOnline?: boolean;
  lastSeen?: Date;
  expoPushToken?: string;
  activeChats?: string[];
  crewIds?: string[];
  notificationSettings?: NotificationSettings;
}
