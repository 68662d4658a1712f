import { UnauthorizedException } from '@nestjs/common';
import { TokenKind } from '../interfaces/token-claims.interface';

export type TokenFailureReason = 'invalid_signature' | 'expired' | 'wrong_kind';

/**
 * Base class for the ways a presented token can fail validation.
 * `reason` lets callers tell the cases apart without string matching.
 */
export abstract class TokenValidationException extends UnauthorizedException {
  abstract readonly reason: TokenFailureReason;
}

/**
 * Signature did not verify, or the token is not a well-formed JWT
 * carrying our claims.
 */
export class InvalidTokenSignatureException extends TokenValidationException {
  readonly reason = 'invalid_signature';

  constructor() {
    super({
      statusCode: 401,
      error: 'Unauthorized',
      code: 'TOKEN_INVALID',
      message: 'Token signature is invalid',
    });
  }
}

/**
 * Token was validated at or after its expiry instant.
 */
export class TokenExpiredException extends TokenValidationException {
  readonly reason = 'expired';

  constructor() {
    super({
      statusCode: 401,
      error: 'Unauthorized',
      code: 'TOKEN_EXPIRED',
      message: 'Token has expired',
    });
  }
}

/**
 * Token is genuine but was minted for the other purpose
 * (a refresh token presented as an access token, or the reverse).
 */
export class WrongTokenKindException extends TokenValidationException {
  readonly reason = 'wrong_kind';

  constructor(expected: TokenKind) {
    super({
      statusCode: 401,
      error: 'Unauthorized',
      code: 'TOKEN_WRONG_KIND',
      message: `Expected a ${expected} token`,
    });
  }
}

/**
 * Uniform rejection raised by JwtAuthGuard. Missing header, malformed
 * header and every token failure look the same to the caller.
 */
export class UnauthorizedRequestException extends UnauthorizedException {
  constructor() {
    super({
      statusCode: 401,
      error: 'Unauthorized',
      code: 'UNAUTHORIZED',
      message: 'Authentication required',
    });
  }
}
