import type { Request } from 'express';

/**
 * Shape of request.user once JwtAuthGuard has accepted the access token.
 */
export interface RequestUser {
  userId: string;
}

/**
 * Express Request extended with the authenticated user.
 * Use this type in handlers that run behind JwtAuthGuard.
 */
export interface AuthenticatedRequest extends Request {
  user: RequestUser;
}
