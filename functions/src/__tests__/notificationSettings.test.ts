import {
  NOTIFICATION_TYPE_TO_CATEGORY,
  getNotificationCategory,
  shouldSendNotification,
} from '../utils/notificationSettings';

describe('shouldSendNotification', () => {
  it('should send every type when the user has no settings', () => {
    expect(shouldSendNotification(undefined, 'crew_chat_message')).toBe(true);
    expect(shouldSendNotification(null, 'crew_invitation')).toBe(true);
  });

  it('should respect a disabled category', () => {
    const settings = { crewMessages: false, safetyAlerts: true, jobSharing: true, crewManagement: true };

    expect(shouldSendNotification(settings, 'crew_chat_message')).toBe(false);
    expect(shouldSendNotification(settings, 'crew_safety_alert')).toBe(true);
  });

  it('should fall back to the default for a missing or malformed category', () => {
    expect(shouldSendNotification({ crewMessages: false }, 'crew_job_shared')).toBe(true);
    expect(shouldSendNotification({ jobSharing: 'no' }, 'crew_job_shared')).toBe(true);
  });

  it('should map every crew management type to the same category', () => {
    const types = [
      'crew_invitation',
      'crew_invitation_accepted',
      'crew_invitation_declined',
      'crew_member_joined',
      'crew_member_left',
      'crew_disbanded',
    ] as const;

    types.forEach((type) => {
      expect(NOTIFICATION_TYPE_TO_CATEGORY[type]).toBe('crewManagement');
    });
  });
});

describe('getNotificationCategory', () => {
  it('should return the category of a known type', () => {
    expect(getNotificationCategory('crew_safety_alert')).toBe('safetyAlerts');
  });

  it('should return null for an unknown type', () => {
    expect(getNotificationCategory('poll_created')).toBeNull();
  });
});
