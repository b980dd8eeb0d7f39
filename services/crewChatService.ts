// services/crewChatService.ts
// Crew chat on Firestore: crews/{crewId}/messages, with read state kept in
// the crews/{crewId}/messages/metadata document.

import { debounce, DebouncedFunc } from 'lodash';
import {
  collection,
  deleteField,
  doc,
  DocumentData,
  FirestoreError,
  getDoc,
  getDocs,
  increment,
  limit,
  onSnapshot,
  orderBy,
  query,
  QueryDocumentSnapshot,
  serverTimestamp,
  setDoc,
  startAfter,
  Timestamp,
  Unsubscribe,
  updateDoc,
  where,
  writeBatch,
} from 'firebase/firestore';
import { db } from '../firebase';
import { CrewMessage, CrewMessageType, isCriticalMessage, SafetyAlertSeverity } from '../types/CrewMessage';
import { CrewError } from '../utils/crewErrors';
import { validateMessageContent } from '../utils/crewValidation';
import { asOptionalDate, asRecord, messageFromFirestore } from '../utils/firestoreMappers';
import { countUnreadMessages } from '../utils/tailboard';
import { getCurrentUser, requireCrewUser } from './authService';

export const MESSAGES_PER_LOAD = 20;
export const CHAT_METADATA_ID = 'metadata';
export const LAST_READ_DEBOUNCE_MS = 1000;

const messagesRef = (crewId: string) => collection(db, 'crews', crewId, 'messages');
const metadataRef = (crewId: string) => doc(db, 'crews', crewId, 'messages', CHAT_METADATA_ID);

const toMessages = (crewId: string, docs: QueryDocumentSnapshot<DocumentData>[]): CrewMessage[] =>
  docs
    .filter((messageDoc) => messageDoc.id !== CHAT_METADATA_ID)
    .map((messageDoc) => messageFromFirestore(crewId, messageDoc.id, messageDoc.data()));

const validatedText = (text: string): string => {
  const contentError = validateMessageContent(text);
  if (contentError) {
    throw new CrewError('invalid-argument', contentError);
  }
  return text.trim();
};

// ============================================================================
// SENDING
// ============================================================================

const writeMessage = async (
  crewId: string,
  text: string,
  type: CrewMessageType,
  metadata?: Record<string, unknown>,
): Promise<string> => {
  const user = requireCrewUser();
  const messageRef = doc(messagesRef(crewId));
  const batch = writeBatch(db);

  batch.set(messageRef, {
    senderId: user.uid,
    ...(user.displayName ? { senderName: user.displayName } : {}),
    text: validatedText(text),
    type,
    ...(metadata ? { metadata } : {}),
    reactions: {},
    isDeleted: false,
    createdAt: serverTimestamp(),
  });
  batch.set(metadataRef(crewId), { hasMessages: true }, { merge: true });
  batch.update(doc(db, 'crews', crewId), {
    'stats.totalMessages': increment(1),
    'stats.lastActivityAt': serverTimestamp(),
  });

  if (isCriticalMessage(type)) {
    batch.set(doc(collection(db, 'crews', crewId, 'activity')), {
      actorId: user.uid,
      type: 'safetyAlert',
      data: { messageId: messageRef.id, severity: type },
      timestamp: serverTimestamp(),
      readByMemberIds: [user.uid],
    });
  }

  await batch.commit();
  return messageRef.id;
};

/**
 * Send a message to the crew chat. Returns the new message id.
 */
export const sendMessage = async (
  crewId: string,
  text: string,
  type: CrewMessageType = 'text',
  metadata?: Record<string, unknown>,
): Promise<string> => {
  try {
    return await writeMessage(crewId, text, type, metadata);
  } catch (error) {
    console.error('Error sending message:', error);
    throw error;
  }
};

/**
 * Broadcast a safety alert. It is also recorded on the crew's activity stream.
 */
export const sendSafetyAlert = async (
  crewId: string,
  text: string,
  severity: SafetyAlertSeverity,
): Promise<string> => {
  try {
    return await writeMessage(crewId, text, severity, { severity });
  } catch (error) {
    console.error('Error sending safety alert:', error);
    throw error;
  }
};

// ============================================================================
// READING
// ============================================================================

/**
 * Subscribe to the latest page of messages, oldest first.
 */
export const listenToMessages = (
  crewId: string,
  onChange: (messages: CrewMessage[]) => void,
  pageSize: number = MESSAGES_PER_LOAD,
  onError?: (error: Error) => void,
): Unsubscribe =>
  onSnapshot(
    query(messagesRef(crewId), orderBy('createdAt', 'desc'), limit(pageSize)),
    (snapshot) => onChange(toMessages(crewId, snapshot.docs).reverse()),
    (error) => {
      console.error(`Error listening to messages for crew ${crewId}:`, error);
      onError?.(error);
    },
  );

export interface MessagePage {
  messages: CrewMessage[];
  hasMore: boolean;
}

/**
 * Load the page of messages sent before the given time, oldest first.
 */
export const loadEarlierMessages = async (
  crewId: string,
  before: Date,
  pageSize: number = MESSAGES_PER_LOAD,
): Promise<MessagePage> => {
  try {
    const snapshot = await getDocs(
      query(
        messagesRef(crewId),
        orderBy('createdAt', 'desc'),
        startAfter(Timestamp.fromDate(before)),
        limit(pageSize),
      ),
    );
    return {
      messages: toMessages(crewId, snapshot.docs).reverse(),
      hasMore: snapshot.docs.length === pageSize,
    };
  } catch (error) {
    console.error('[CrewChat] Error loading earlier messages:', error);
    throw error;
  }
};

// ============================================================================
// EDITING
// ============================================================================

const loadOwnMessage = async (crewId: string, messageId: string, uid: string) => {
  const messageDoc = await getDoc(doc(messagesRef(crewId), messageId));
  if (!messageDoc.exists()) {
    throw new CrewError('not-found', 'Message not found');
  }
  const message = messageFromFirestore(crewId, messageDoc.id, messageDoc.data());
  if (message.isDeleted) {
    throw new CrewError('invalid-argument', 'Message has been deleted');
  }
  if (message.type === 'system') {
    throw new CrewError('invalid-argument', 'System messages cannot be changed');
  }
  if (message.senderId !== uid) {
    throw new CrewError('permission-denied', 'You can only change your own messages');
  }
  return message;
};

export const editMessage = async (crewId: string, messageId: string, text: string): Promise<void> => {
  try {
    const user = requireCrewUser();
    const newText = validatedText(text);
    const message = await loadOwnMessage(crewId, messageId, user.uid);
    if (message.type !== 'text') {
      throw new CrewError('invalid-argument', 'Only text messages can be edited');
    }
    await updateDoc(doc(messagesRef(crewId), messageId), {
      text: newText,
      editedAt: serverTimestamp(),
    });
  } catch (error) {
    console.error('Error editing message:', error);
    throw error;
  }
};

/**
 * Soft delete: the message stays in the history with its text cleared.
 */
export const deleteMessage = async (crewId: string, messageId: string): Promise<void> => {
  try {
    const user = requireCrewUser();
    await loadOwnMessage(crewId, messageId, user.uid);
    await updateDoc(doc(messagesRef(crewId), messageId), {
      text: '',
      isDeleted: true,
      editedAt: serverTimestamp(),
    });
  } catch (error) {
    console.error('Error deleting message:', error);
    throw error;
  }
};

/**
 * Set the current user's reaction on a message; null clears it.
 */
export const reactToMessage = async (
  crewId: string,
  messageId: string,
  emoji: string | null,
): Promise<void> => {
  try {
    const user = requireCrewUser();
    const messageRef = doc(messagesRef(crewId), messageId);
    const messageDoc = await getDoc(messageRef);
    if (!messageDoc.exists()) {
      throw new CrewError('not-found', 'Message not found');
    }
    await updateDoc(messageRef, {
      [`reactions.${user.uid}`]: emoji ? emoji : deleteField(),
    });
  } catch (error) {
    console.error('Error reacting to message:', error);
    throw error;
  }
};

// ============================================================================
// READ STATE
// ============================================================================

const writeLastRead = async (crewId: string, uid: string) => {
  await setDoc(metadataRef(crewId), { lastRead: { [uid]: serverTimestamp() } }, { merge: true });
};

const lastReadWriters = new Map<string, DebouncedFunc<(uid: string) => void>>();

const getLastReadWriter = (crewId: string) => {
  const existing = lastReadWriters.get(crewId);
  if (existing) {
    return existing;
  }
  const writer = debounce((uid: string) => {
    writeLastRead(crewId, uid).catch((error) => {
      console.warn(`Error updating lastRead for chat ${crewId}:`, error);
    });
  }, LAST_READ_DEBOUNCE_MS);
  lastReadWriters.set(crewId, writer);
  return writer;
};

/**
 * Mark the crew chat as read for the current user. Calls within
 * LAST_READ_DEBOUNCE_MS of each other collapse into one write.
 */
export const updateLastRead = (crewId: string): void => {
  const user = getCurrentUser();
  if (!user) return;
  getLastReadWriter(crewId)(user.uid);
};

// Send any pending read receipts now, e.g. when the chat screen closes.
export const flushLastRead = (): void => {
  lastReadWriters.forEach((writer) => writer.flush());
};

/**
 * Messages from other members since the user last read the chat. A user who
 * has never opened the chat has no read marker and gets 0.
 */
export const fetchUnreadCount = async (crewId: string): Promise<number> => {
  const user = getCurrentUser();
  if (!user) return 0;
  try {
    const metadataDoc = await getDoc(metadataRef(crewId));
    if (!metadataDoc.exists()) return 0;

    const lastRead = asOptionalDate(asRecord(metadataDoc.data().lastRead)[user.uid]);
    if (!lastRead) return 0;

    const snapshot = await getDocs(
      query(messagesRef(crewId), where('createdAt', '>', Timestamp.fromDate(lastRead))),
    );
    return countUnreadMessages(toMessages(crewId, snapshot.docs), lastRead, user.uid);
  } catch (error) {
    if (
      error instanceof FirestoreError &&
      (error.code === 'permission-denied' || error.code === 'unavailable')
    ) {
      // Expected while signed out of the crew or offline
      return 0;
    }
    console.error(`Error fetching unread count for chat ${crewId}:`, error);
    return 0;
  }
};
