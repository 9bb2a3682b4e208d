export type Username = string;

/** Seconds since the Unix epoch. */
export type Timestamp = number;

export type Clock = () => Timestamp;

export interface Message {
  author: Username;
  content: string;
  // Empty means broadcast
  recipients: Username[];
}

export type TimestampedMessage = [Timestamp, Message];

/**
 * Stored credential for an identity: a bcrypt hash, or null for a bare
 * (membership-only) identity.
 */
export type Credential = string | null;

export interface MessengerStats {
  users: number;
  messages: number;
}

export class ConflictError extends Error {
  constructor(public readonly username: Username) {
    super(`User '${username}' already exists`);
    this.name = 'ConflictError';
  }
}

export class CredentialRequiredError extends Error {
  constructor(public readonly username: Username) {
    super(`A password is required to register '${username}'`);
    this.name = 'CredentialRequiredError';
  }
}

export class AuthenticationError extends Error {
  constructor() {
    super('Unauthorized');
    this.name = 'AuthenticationError';
  }
}

export class NonExistentAuthorError extends Error {
  constructor(public readonly author: Username) {
    super("Message author doesn't exist!");
    this.name = 'NonExistentAuthorError';
  }
}

export class NonExistentRecipientError extends Error {
  constructor(public readonly recipient: Username) {
    super(`Recipient '${recipient}' doesn't exist`);
    this.name = 'NonExistentRecipientError';
  }
}

export class HashError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HashError';
  }
}

export class ClockError extends Error {
  constructor(public readonly reading: number) {
    super(`Clock returned an invalid timestamp: ${reading}`);
    this.name = 'ClockError';
  }
}
