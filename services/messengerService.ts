import {
  AuthenticationError,
  NonExistentRecipientError,
  type Message,
  type MessengerStats,
  type Timestamp,
  type TimestampedMessage,
  type Username,
} from '../types.js';
import type { Directory } from './directoryService.js';
import type { MessageLog } from './messageLogService.js';
import type { ReadWriteLock } from './stateLock.js';
import { loggerService } from './loggerService.js';

export interface MessengerState {
  directory: Directory;
  messageLog: MessageLog;
  lock: ReadWriteLock;
}

export interface SnapshotWriter {
  save: (directory: Directory, messageLog: MessageLog) => Promise<void>;
}

export type MessengerService = ReturnType<typeof createMessengerService>;

/**
 * The one handle to the directory and message log. Every operation runs under
 * the shared lock: mutations hold it exclusively from their first check to
 * their last write.
 */
export const createMessengerService = ({ directory, messageLog, lock }: MessengerState) => ({
  register: (username: Username, password?: string): Promise<void> =>
    lock.withWrite(async () => {
      await directory.register(username, password);
      loggerService.info(`User registered: ${username}`);
    }),

  /**
   * Authenticates the author, checks every recipient, then appends. Nothing
   * is recorded unless all checks pass. Resolves to the assigned timestamp.
   */
  send: (message: Message, password?: string): Promise<Timestamp> =>
    lock.withWrite(async () => {
      if (!(await directory.verifyCredential(message.author, password))) {
        throw new AuthenticationError();
      }

      const unknown = message.recipients.find((recipient) => !directory.contains(recipient));
      if (unknown !== undefined) {
        throw new NonExistentRecipientError(unknown);
      }

      const timestamp = messageLog.append(message, directory);
      loggerService.debug(`Message from ${message.author} recorded at ${timestamp}`, {
        recipients: message.recipients.length,
      });
      return timestamp;
    }),

  receive: (username: Username, password: string | undefined, since: Timestamp): Promise<TimestampedMessage[]> =>
    lock.withRead(async () => {
      if (!(await directory.verifyCredential(username, password))) {
        throw new AuthenticationError();
      }
      const now = messageLog.now();
      return Array.from(messageLog.queryAfter(since, now, username));
    }),

  stats: (): Promise<MessengerStats> =>
    lock.withRead(() => ({
      users: directory.size,
      messages: messageLog.size,
    })),

  /**
   * Waits for in-flight operations, then writes both structures.
   */
  persist: (snapshot: SnapshotWriter): Promise<void> =>
    lock.withWrite(() => snapshot.save(directory, messageLog)),
});
