// ── Module ──────────────────────────────────────────────────
export { AuthModule, jwtModuleOptions } from './auth.module';

// ── Guards (for use in other feature modules) ───────────────
export { JwtAuthGuard } from './guards';

// ── Decorators (for use in other feature modules) ───────────
export { CurrentUser } from './decorators';

// ── Interfaces (for typing in other feature modules) ────────
export { TokenKind } from './interfaces';
export type {
  TokenClaims,
  TokenPair,
  RequestUser,
  AuthenticatedRequest,
} from './interfaces';
