import { CanActivate, ExecutionContext, Injectable, Logger } from '@nestjs/common';
import type { Request } from 'express';
import { TokenService } from '../token.service';
import { TokenKind } from '../interfaces/token-claims.interface';
import type { RequestUser } from '../interfaces/authenticated-request.interface';
import {
  TokenValidationException,
  UnauthorizedRequestException,
} from '../exceptions/token.exceptions';

const BEARER_PATTERN = /^Bearer\s+(\S+)$/i;

/**
 * JWT Authentication Guard — protects routes that require an access token.
 *
 * Usage:
 * ```ts
 * @UseGuards(JwtAuthGuard)
 * @Get('protected')
 * getProtected(@CurrentUser() user: RequestUser): string {
 *   return user.userId;
 * }
 * ```
 *
 * Every rejection (no header, not a Bearer header, bad/expired/refresh
 * token) reaches the caller as the same UnauthorizedRequestException.
 * The specific reason is only logged.
 */
@Injectable()
export class JwtAuthGuard implements CanActivate {
  private readonly logger = new Logger(JwtAuthGuard.name);

  constructor(private readonly tokenService: TokenService) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context
      .switchToHttp()
      .getRequest<Request & { user?: RequestUser }>();

    request.user = this.authenticate(request.headers.authorization);
    return true;
  }

  private authenticate(header: string | undefined): RequestUser {
    if (header === undefined) {
      return this.reject('authorization header is missing');
    }

    const match = BEARER_PATTERN.exec(header.trim());
    if (!match) {
      return this.reject('authorization header is not a Bearer credential');
    }

    try {
      const claims = this.tokenService.validate(match[1], TokenKind.ACCESS);
      return { userId: claims.sub };
    } catch (error) {
      if (error instanceof TokenValidationException) {
        return this.reject(`token rejected (${error.reason})`);
      }
      throw error;
    }
  }

  private reject(reason: string): never {
    this.logger.debug(`JWT auth rejected: ${reason}`);
    throw new UnauthorizedRequestException();
  }
}
