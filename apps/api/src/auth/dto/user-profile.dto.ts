import type { User } from '@scribe/database';

/**
 * Public user summary — never includes passwordHash.
 *
 * Only constructible from an entity via fromEntity(), so every field
 * that reaches a response is listed here explicitly.
 */
export class UserProfileDto {
  id: string;
  email: string;
  createdAt: Date;

  private constructor(id: string, email: string, createdAt: Date) {
    this.id = id;
    this.email = email;
    this.createdAt = createdAt;
  }

  static fromEntity(user: User): UserProfileDto {
    return new UserProfileDto(user.id, user.email, user.createdAt);
  }
}
