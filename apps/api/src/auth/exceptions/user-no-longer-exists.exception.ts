import { UnauthorizedException } from '@nestjs/common';

/**
 * Thrown when a valid token names a user that has since been deleted.
 *
 * HTTP 401 Unauthorized — the client must log in again.
 */
export class UserNoLongerExistsException extends UnauthorizedException {
  constructor() {
    super({
      statusCode: 401,
      error: 'Unauthorized',
      code: 'USER_NOT_FOUND',
      message: 'User no longer exists',
    });
  }
}
