// functions/src/types/NotificationSettings.ts

export interface NotificationSettings {
  crewMessages: boolean;
  safetyAlerts: boolean;
  jobSharing: boolean;
  crewManagement: boolean;
}

export const DEFAULT_NOTIFICATION_SETTINGS: NotificationSettings = {
  crewMessages: true,
  safetyAlerts: true,
  jobSharing: true,
  crewManagement: true,
};
