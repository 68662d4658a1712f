import { UnauthorizedException } from '@nestjs/common';

/**
 * Thrown when login credentials are invalid (wrong email or password).
 *
 * HTTP 401 Unauthorized — one message for both cases so the response
 * does not reveal which accounts exist.
 */
export class InvalidCredentialsException extends UnauthorizedException {
  constructor() {
    super({
      statusCode: 401,
      error: 'Unauthorized',
      code: 'INVALID_CREDENTIALS',
      message: 'Invalid email or password',
    });
  }
}
