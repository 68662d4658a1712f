import { Injectable } from '@nestjs/common';
import * as argon2 from 'argon2';
import { MalformedPasswordHashError } from './exceptions/malformed-password-hash.error';

/** PHC-format prefix every hash produced by this service starts with */
const ARGON2_PREFIX = '$argon2';

/**
 * PasswordHasher — one-way salted hashing with argon2id.
 *
 * The random salt and cost parameters are embedded in the PHC string
 * returned by hash(), so nothing besides that string needs storing.
 * A mismatch is a normal `false`; an unparseable stored hash throws.
 */
@Injectable()
export class PasswordHasher {
  async hash(plaintext: string): Promise<string> {
    return argon2.hash(plaintext, { type: argon2.argon2id });
  }

  /**
   * @throws MalformedPasswordHashError if `storedHash` is not an argon2 PHC string
   */
  async verify(plaintext: string, storedHash: string): Promise<boolean> {
    if (!storedHash.startsWith(ARGON2_PREFIX)) {
      throw new MalformedPasswordHashError();
    }

    try {
      return await argon2.verify(storedHash, plaintext);
    } catch (error) {
      throw new MalformedPasswordHashError({ cause: error });
    }
  }
}
