import { Expo, ExpoPushMessage, ExpoPushTicket } from 'expo-server-sdk';

const expo = new Expo();

const hasValidTokens = (message: ExpoPushMessage): boolean => {
  const tokens = Array.isArray(message.to) ? message.to : [message.to];
  return tokens.length > 0 && tokens.every((token) => Expo.isExpoPushToken(token));
};

/**
 * Sends push notifications through Expo, in chunks of the size Expo accepts.
 * Messages addressed to invalid tokens are dropped.
 * @param {ExpoPushMessage[]} messages The notifications to send
 * @return {Promise<ExpoPushTicket[]>} The tickets Expo returned
 */
export async function sendExpoNotifications(messages: ExpoPushMessage[]): Promise<ExpoPushTicket[]> {
  const validMessages = messages.filter(hasValidTokens);
  if (validMessages.length < messages.length) {
    console.warn(`Dropped ${messages.length - validMessages.length} notifications with invalid push tokens.`);
  }

  const tickets: ExpoPushTicket[] = [];
  const chunks = expo.chunkPushNotifications(validMessages);

  for (const chunk of chunks) {
    try {
      const chunkTickets = await expo.sendPushNotificationsAsync(chunk);
      tickets.push(...chunkTickets);
    } catch (error) {
      console.error('Error sending notification chunk:', error);
    }
  }

  tickets.forEach((ticket) => {
    if (ticket.status === 'error') {
      console.error(`Error sending notification: ${ticket.message}`, ticket.details);
    }
  });

  return tickets;
}
