import type { User } from '@scribe/database';

export interface NewUserRecord {
  /** Already normalized (trimmed, lower-cased) */
  email: string;
  passwordHash: string;
}

/**
 * CredentialStore — persistence boundary for user records.
 *
 * Implementations must enforce email uniqueness at the storage layer and
 * raise EmailAlreadyExistsException when it is violated, including when
 * two registrations race each other.
 */
export abstract class CredentialStore {
  abstract findByEmail(email: string): Promise<User | null>;

  abstract findById(id: string): Promise<User | null>;

  abstract create(record: NewUserRecord): Promise<User>;
}
