import {
  Controller,
  Post,
  Body,
  HttpCode,
  HttpStatus,
} from '@nestjs/common';
import { AuthService } from './auth.service';
import {
  RegisterDto,
  LoginDto,
  RefreshTokenDto,
  AuthResponseDto,
  UserProfileDto,
} from './dto';

/**
 * AuthController — REST endpoints for the token lifecycle.
 *
 * Routes:
 * - POST /auth/register  → Create a new user account (public)
 * - POST /auth/login     → Authenticate and receive a token pair (public)
 * - POST /auth/refresh   → Exchange a refresh token for a new pair (public)
 */
@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  /**
   * Register a new user.
   *
   * @returns 201 Created with the user summary
   * @throws 409 Conflict if email already exists
   * @throws 400 Bad Request if validation fails
   */
  @Post('register')
  @HttpCode(HttpStatus.CREATED)
  async register(@Body() dto: RegisterDto): Promise<UserProfileDto> {
    return this.authService.register(dto);
  }

  /**
   * Login with email and password.
   *
   * @returns 200 OK with access and refresh tokens
   * @throws 401 Unauthorized if credentials are invalid
   */
  @Post('login')
  @HttpCode(HttpStatus.OK)
  async login(@Body() dto: LoginDto): Promise<AuthResponseDto> {
    return this.authService.login(dto);
  }

  /**
   * @returns 200 OK with a brand-new token pair
   * @throws 401 Unauthorized if the refresh token is invalid, expired or an access token
   */
  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  async refresh(@Body() dto: RefreshTokenDto): Promise<AuthResponseDto> {
    return this.authService.refresh(dto.refresh_token);
  }
}
