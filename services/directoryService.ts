import { ConflictError, CredentialRequiredError, type Credential, type Username } from '../types.js';
import type { PasswordHasher } from './passwordService.js';

/**
 * Known identities, each mapped to a bcrypt hash or to null (bare identity).
 *
 * With a hasher, registration requires a password and `verifyCredential`
 * checks it. Without one, the directory only tracks membership and
 * `verifyCredential` is true for any known user.
 *
 * Grows only by registration. Callers serialize access through the state lock.
 */
export class Directory {
  private readonly entries = new Map<Username, Credential>();

  constructor(
    private readonly hasher: PasswordHasher | null,
    entries: Iterable<[Username, Credential]> = []
  ) {
    for (const [username, credential] of entries) {
      this.entries.set(username, credential);
    }
  }

  get credentialsEnabled(): boolean {
    return this.hasher !== null;
  }

  get size(): number {
    return this.entries.size;
  }

  contains(username: Username): boolean {
    return this.entries.has(username);
  }

  credentialOf(username: Username): Credential | undefined {
    return this.entries.get(username);
  }

  async register(username: Username, password?: string): Promise<void> {
    if (this.entries.has(username)) {
      throw new ConflictError(username);
    }

    let credential: Credential = null;
    if (this.hasher) {
      if (password === undefined) {
        throw new CredentialRequiredError(username);
      }
      credential = await this.hasher.hash(password);
    }

    // Callers that do not hold the state lock can interleave during hashing
    if (this.entries.has(username)) {
      throw new ConflictError(username);
    }
    this.entries.set(username, credential);
  }

  /**
   * False (not an error) for unknown users. Rejects with HashError when the
   * hasher fails.
   */
  async verifyCredential(username: Username, password?: string): Promise<boolean> {
    const credential = this.entries.get(username);
    if (credential === undefined) return false;
    if (!this.hasher) return true;
    // Bare entries loaded from an older snapshot cannot authenticate
    if (credential === null || password === undefined) return false;
    return this.hasher.matches(password, credential);
  }

  toRecord(): Record<Username, Credential> {
    return Object.fromEntries(this.entries);
  }
}
