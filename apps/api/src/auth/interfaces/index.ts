export { TokenKind } from './token-claims.interface';
export type { TokenClaims, TokenPair } from './token-claims.interface';
export type {
  RequestUser,
  AuthenticatedRequest,
} from './authenticated-request.interface';
