export type CrewMessageType =
  | 'text'
  | 'system'
  | 'jobShare'
  | 'safetyAlert'
  | 'emergency'
  | 'weatherAlert'
  | 'location'
  | 'image';

export interface CrewMessage {
  id: string;
  crewId: string;
  senderId: string;
  senderName?: string;
  text: string;
  type: CrewMessageType;
  metadata?: Record<string, unknown>;
  reactions: Record<string, string>;
  createdAt: Date;
  editedAt?: Date;
  isDeleted: boolean;
}

export type SafetyAlertSeverity = 'emergency' | 'safetyAlert';

const CRITICAL_MESSAGE_TYPES: readonly CrewMessageType[] = ['emergency', 'safetyAlert', 'weatherAlert'];

export const isCriticalMessage = (type: CrewMessageType): boolean =>
  CRITICAL_MESSAGE_TYPES.includes(type);
