import { NotificationSettings, DEFAULT_NOTIFICATION_SETTINGS } from '../types/NotificationSettings';

export type NotificationType =
  | 'crew_chat_message'
  | 'crew_safety_alert'
  | 'crew_job_shared'
  | 'crew_invitation'
  | 'crew_invitation_accepted'
  | 'crew_invitation_declined'
  | 'crew_member_joined'
  | 'crew_member_left'
  | 'crew_disbanded';

/**
 * Maps notification types to their corresponding categories
 */
export const NOTIFICATION_TYPE_TO_CATEGORY: Record<NotificationType, keyof NotificationSettings> = {
  // Crew chat
  'crew_chat_message': 'crewMessages',

  // Emergency, safety and weather alerts
  'crew_safety_alert': 'safetyAlerts',

  // Job sharing
  'crew_job_shared': 'jobSharing',

  // Crew management
  'crew_invitation': 'crewManagement',
  'crew_invitation_accepted': 'crewManagement',
  'crew_invitation_declined': 'crewManagement',
  'crew_member_joined': 'crewManagement',
  'crew_member_left': 'crewManagement',
  'crew_disbanded': 'crewManagement',
};

/**
 * Checks if a notification should be sent based on user's notification settings
 * @param {unknown} userNotificationSettings The notificationSettings field of the user document, if any
 * @param {NotificationType} notificationType The type of notification being sent
 * @return {boolean} true if the notification should be sent, false otherwise
 */
export function shouldSendNotification(
  userNotificationSettings: unknown,
  notificationType: NotificationType
): boolean {
  const category = NOTIFICATION_TYPE_TO_CATEGORY[notificationType];

  // Missing or partially written settings fall back to the defaults
  if (typeof userNotificationSettings !== 'object' || userNotificationSettings === null) {
    return DEFAULT_NOTIFICATION_SETTINGS[category];
  }
  const value: unknown = Object.getOwnPropertyDescriptor(userNotificationSettings, category)?.value;
  return typeof value === 'boolean' ? value : DEFAULT_NOTIFICATION_SETTINGS[category];
}

/**
 * Gets the category for a notification type
 * @param {string} notificationType The notification type
 * @return {string|null} The category name or null if unknown
 */
export function getNotificationCategory(notificationType: string): keyof NotificationSettings | null {
  const match = Object.entries(NOTIFICATION_TYPE_TO_CATEGORY).find(([type]) => type === notificationType);
  return match ? match[1] : null;
}
