/**
 * Purpose a token was minted for. An access token is never accepted where
 * a refresh token is required, and vice versa.
 */
export enum TokenKind {
  ACCESS = 'access',
  REFRESH = 'refresh',
}

/**
 * Payload signed into every token.
 *
 * Timestamps are whole seconds since the epoch (JWT NumericDate), and
 * `exp` is always strictly greater than `iat`.
 */
export interface TokenClaims {
  /** User ID (UUID) — maps to User.id */
  sub: string;

  kind: TokenKind;

  iat: number;

  exp: number;

  /** Unique token ID; distinguishes tokens minted in the same second */
  jti: string;
}

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
}
