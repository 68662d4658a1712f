import { randomUUID } from 'crypto';
import { User } from '@scribe/database';
import { CredentialStore } from '../../src/auth/credentials/credential-store';
import type { NewUserRecord } from '../../src/auth/credentials/credential-store';
import { EmailAlreadyExistsException } from '../../src/auth/exceptions';

export class InMemoryCredentialStore extends CredentialStore {
  private readonly users = new Map<string, User>();

  async findByEmail(email: string): Promise<User | null> {
    for (const user of this.users.values()) {
      if (user.email === email) {
        return user;
      }
    }
    return null;
  }

  async findById(id: string): Promise<User | null> {
    return this.users.get(id) ?? null;
  }

  async create(record: NewUserRecord): Promise<User> {
    if (await this.findByEmail(record.email)) {
      throw new EmailAlreadyExistsException(record.email);
    }

    const now = new Date();
    const user = Object.assign(new User(), {
      id: randomUUID(),
      email: record.email,
      passwordHash: record.passwordHash,
      createdAt: now,
      updatedAt: now,
      transcripts: [],
    });
    this.users.set(user.id, user);
    return user;
  }

  remove(id: string): void {
    this.users.delete(id);
  }
}
