// services/presenceService.ts
import { doc, serverTimestamp, updateDoc } from 'firebase/firestore';
import { db } from '../firebase';

export type LifecycleState = 'active' | 'background' | 'inactive';

export const setOnlineStatus = async (uid: string, isOnline: boolean): Promise<void> => {
  await updateDoc(doc(db, 'users', uid), {
    isOnline,
    lastSeen: serverTimestamp(),
  });
};

type StatusWriter = (uid: string, isOnline: boolean) => Promise<void>;

/**
 * Mirrors the app lifecycle into the user's online status. Write failures are
 * logged, never thrown, and the next state change writes again.
 */
export class PresenceTracker {
  private isOnline: boolean | null = null;
  private stopped = false;

  constructor(
    private readonly uid: string,
    private readonly writeStatus: StatusWriter = setOnlineStatus,
  ) {}

  async start(): Promise<void> {
    this.stopped = false;
    await this.update(true, 'Error setting initial online status:');
  }

  async handleStateChange(nextState: LifecycleState): Promise<void> {
    if (this.stopped) return;
    await this.update(nextState === 'active', 'Error updating user online status:');
  }

  async stop(): Promise<void> {
    this.stopped = true;
    await this.update(false, 'Error updating offline status on stop:');
  }

  private async update(isOnline: boolean, errorMessage: string) {
    if (this.isOnline === isOnline) return;
    try {
      await this.writeStatus(this.uid, isOnline);
      this.isOnline = isOnline;
    } catch (error) {
      console.error(errorMessage, error);
    }
  }
}
