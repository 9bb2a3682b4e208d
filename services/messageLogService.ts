import {
  ClockError,
  NonExistentAuthorError,
  type Clock,
  type Message,
  type Timestamp,
  type TimestampedMessage,
  type Username,
} from '../types.js';

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

const copyMessage = (message: Message): Message => ({
  author: message.author,
  content: message.content,
  recipients: [...message.recipients],
});

const isVisibleTo = (message: Message, recipient?: Username): boolean =>
  recipient === undefined ||
  message.recipients.length === 0 ||
  message.recipients.includes(recipient);

/**
 * Append-only log of messages keyed by the second they were posted.
 * Messages sharing a second keep their posting order.
 */
export class MessageLog {
  private readonly buckets = new Map<Timestamp, Message[]>();
  // Ascending
  private readonly timestamps: Timestamp[] = [];
  // Highest timestamp handed out or loaded; appends never go below it
  private lastAssigned = 0;

  constructor(
    private readonly clock: Clock = systemClock,
    entries: Iterable<[Timestamp, Message[]]> = []
  ) {
    for (const [timestamp, messages] of entries) {
      for (const message of messages) {
        this.insert(timestamp, copyMessage(message));
      }
    }
  }

  get size(): number {
    let total = 0;
    for (const messages of this.buckets.values()) total += messages.length;
    return total;
  }

  get firstTimestamp(): Timestamp | undefined {
    return this.timestamps[0];
  }

  get lastTimestamp(): Timestamp | undefined {
    return this.timestamps[this.timestamps.length - 1];
  }

  now(): Timestamp {
    const reading = this.clock();
    if (!Number.isSafeInteger(reading) || reading < 0) {
      throw new ClockError(reading);
    }
    return reading;
  }

  /**
   * Records `message` at the current second, or at the last assigned second if
   * the clock has stepped back since. The author must be known to `directory`;
   * recipients are the caller's responsibility.
   */
  append(message: Message, directory: { contains: (username: Username) => boolean }): Timestamp {
    const timestamp = Math.max(this.now(), this.lastAssigned);
    if (!directory.contains(message.author)) {
      throw new NonExistentAuthorError(message.author);
    }
    this.insert(timestamp, copyMessage(message));
    return timestamp;
  }

  /**
   * Messages with `since < timestamp < now`, ascending. With a recipient,
   * only broadcasts and messages addressed to that recipient are included.
   * The returned iterable can be iterated more than once and yields copies.
   */
  queryAfter(since: Timestamp, now: Timestamp, recipient?: Username): Iterable<TimestampedMessage> {
    const { buckets, timestamps } = this;
    return {
      *[Symbol.iterator]() {
        for (const timestamp of timestamps) {
          if (timestamp <= since) continue;
          if (timestamp >= now) break;
          for (const message of buckets.get(timestamp) ?? []) {
            if (isVisibleTo(message, recipient)) {
              const entry: TimestampedMessage = [timestamp, copyMessage(message)];
              yield entry;
            }
          }
        }
      },
    };
  }

  toRecord(): Record<string, Message[]> {
    const record: Record<string, Message[]> = {};
    for (const timestamp of this.timestamps) {
      record[String(timestamp)] = (this.buckets.get(timestamp) ?? []).map(copyMessage);
    }
    return record;
  }

  private insert(timestamp: Timestamp, message: Message) {
    this.lastAssigned = Math.max(this.lastAssigned, timestamp);
    const bucket = this.buckets.get(timestamp);
    if (bucket) {
      bucket.push(message);
      return;
    }
    this.buckets.set(timestamp, [message]);

    let low = 0;
    let high = this.timestamps.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (this.timestamps[mid] < timestamp) low = mid + 1;
      else high = mid;
    }
    this.timestamps.splice(low, 0, timestamp);
  }
}
