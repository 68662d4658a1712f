import { Inject, Injectable, Logger } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { randomUUID } from 'crypto';
import { scribeConfig } from '../config/scribe.config';
import type { ScribeConfig } from '../config/scribe.config';
import { CLOCK } from '../common/clock';
import type { Clock } from '../common/clock';
import { TokenKind } from './interfaces/token-claims.interface';
import type { TokenClaims, TokenPair } from './interfaces/token-claims.interface';
import {
  InvalidTokenSignatureException,
  TokenExpiredException,
  WrongTokenKindException,
} from './exceptions/token.exceptions';

const SECONDS_PER_MINUTE = 60;
const SECONDS_PER_DAY = 24 * 60 * 60;

/**
 * TokenService — mints and validates signed access/refresh tokens.
 *
 * Stateless: nothing about issued tokens is persisted. A token is valid
 * exactly when its HS256 signature verifies, the service clock is strictly
 * before `exp`, and its `kind` matches what the caller expects. No leeway
 * is granted at the expiry boundary.
 *
 * Refreshing does not revoke the presented refresh token; it stays usable
 * until it expires on its own.
 */
@Injectable()
export class TokenService {
  private readonly logger = new Logger(TokenService.name);

  constructor(
    private readonly jwtService: JwtService,
    @Inject(scribeConfig.KEY)
    private readonly config: ScribeConfig,
    @Inject(CLOCK)
    private readonly clock: Clock,
  ) {}

  /** Access-token lifetime in seconds, as reported to clients. */
  get accessTokenTtlSeconds(): number {
    return this.config.auth.accessTokenTtlMinutes * SECONDS_PER_MINUTE;
  }

  issuePair(userId: string): TokenPair {
    const issuedAt = this.nowInSeconds();
    const refreshTtlSeconds =
      this.config.auth.refreshTokenTtlDays * SECONDS_PER_DAY;

    return {
      accessToken: this.sign(
        userId,
        TokenKind.ACCESS,
        issuedAt,
        this.accessTokenTtlSeconds,
      ),
      refreshToken: this.sign(
        userId,
        TokenKind.REFRESH,
        issuedAt,
        refreshTtlSeconds,
      ),
    };
  }

  /**
   * Verify a token and return its claims.
   *
   * @throws InvalidTokenSignatureException if the signature or structure is bad
   * @throws TokenExpiredException if the clock is at or past `exp`
   * @throws WrongTokenKindException if the token was minted for the other kind
   */
  validate(token: string, expectedKind: TokenKind): TokenClaims {
    let payload: object;

    try {
      payload = this.jwtService.verify<object>(token, {
        clockTimestamp: this.nowInSeconds(),
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'TokenExpiredError') {
        throw new TokenExpiredException();
      }
      throw new InvalidTokenSignatureException();
    }

    if (!isTokenClaims(payload)) {
      this.logger.warn('Verified token carries an unexpected payload shape');
      throw new InvalidTokenSignatureException();
    }

    if (payload.kind !== expectedKind) {
      throw new WrongTokenKindException(expectedKind);
    }

    return payload;
  }

  /**
   * Exchange a refresh token for a brand-new pair.
   *
   * Callers that must confirm the subject still exists do so with the
   * returned claims' `sub` before handing the pair out.
   */
  refresh(refreshToken: string): { claims: TokenClaims; pair: TokenPair } {
    const claims = this.validate(refreshToken, TokenKind.REFRESH);
    return { claims, pair: this.issuePair(claims.sub) };
  }

  // ── Private Helpers ───────────────────────────────────────

  private sign(
    userId: string,
    kind: TokenKind,
    issuedAt: number,
    ttlSeconds: number,
  ): string {
    const claims: TokenClaims = {
      sub: userId,
      kind,
      iat: issuedAt,
      exp: issuedAt + ttlSeconds,
      jti: randomUUID(),
    };

    return this.jwtService.sign(claims);
  }

  private nowInSeconds(): number {
    return Math.floor(this.clock.now().getTime() / 1000);
  }
}

function isTokenKind(value: unknown): value is TokenKind {
  return value === TokenKind.ACCESS || value === TokenKind.REFRESH;
}

function isTokenClaims(payload: object): payload is TokenClaims {
  return (
    'sub' in payload &&
    typeof payload.sub === 'string' &&
    'kind' in payload &&
    isTokenKind(payload.kind) &&
    'iat' in payload &&
    typeof payload.iat === 'number' &&
    'exp' in payload &&
    typeof payload.exp === 'number' &&
    'jti' in payload &&
    typeof payload.jti === 'string' &&
    payload.exp > payload.iat
  );
}
