import { Injectable, Logger } from '@nestjs/common';
import type { User } from '@scribe/database';
import { RegisterDto, LoginDto, AuthResponseDto, UserProfileDto } from './dto';
import {
  EmailAlreadyExistsException,
  InvalidCredentialsException,
  UserNoLongerExistsException,
} from './exceptions';
import { CredentialStore } from './credentials/credential-store';
import { PasswordHasher } from './password-hasher.service';
import { TokenService } from './token.service';

/**
 * AuthService — registration, login, token refresh and profile lookup.
 *
 * Security considerations:
 * - login() hashes even for unknown emails so response time does not
 *   reveal which accounts exist
 * - Login failures share one vague error
 * - Password hashes never leave this service in a response or log line
 */
@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly credentialStore: CredentialStore,
    private readonly passwordHasher: PasswordHasher,
    private readonly tokenService: TokenService,
  ) {}

  /**
   * Register a new user account.
   *
   * @throws EmailAlreadyExistsException if email is already taken
   */
  async register(dto: RegisterDto): Promise<UserProfileDto> {
    const email = normalizeEmail(dto.email);

    // ── Check for existing email ──────────────────────────
    const existingUser = await this.credentialStore.findByEmail(email);

    if (existingUser) {
      throw new EmailAlreadyExistsException(email);
    }

    // ── Hash password & create user ───────────────────────
    const passwordHash = await this.passwordHasher.hash(dto.password);
    const user = await this.credentialStore.create({ email, passwordHash });

    this.logger.log(`User registered: ${user.id} (${user.email})`);

    return UserProfileDto.fromEntity(user);
  }

  /**
   * Authenticate a user with email and password.
   *
   * @throws InvalidCredentialsException if email doesn't exist or password is wrong
   */
  async login(dto: LoginDto): Promise<AuthResponseDto> {
    const user = await this.credentialStore.findByEmail(
      normalizeEmail(dto.email),
    );

    if (!user) {
      // Still hash to prevent timing-based user enumeration
      await this.passwordHasher.hash(dto.password);
      throw new InvalidCredentialsException();
    }

    const isPasswordValid = await this.passwordHasher.verify(
      dto.password,
      user.passwordHash,
    );

    if (!isPasswordValid) {
      throw new InvalidCredentialsException();
    }

    this.logger.log(`User logged in: ${user.id}`);

    return this.buildTokenResponse(user);
  }

  /**
   * Exchange a refresh token for a new token pair.
   *
   * @throws TokenValidationException subclasses for a bad, expired or wrong-kind token
   * @throws UserNoLongerExistsException if the token's user no longer exists
   */
  async refresh(refreshToken: string): Promise<AuthResponseDto> {
    const { claims, pair } = this.tokenService.refresh(refreshToken);
    const user = await this.credentialStore.findById(claims.sub);

    if (!user) {
      this.logger.warn(`Refresh rejected: user ${claims.sub} no longer exists`);
      throw new UserNoLongerExistsException();
    }

    this.logger.debug(`Token pair refreshed for user ${user.id}`);

    return new AuthResponseDto(
      pair,
      this.tokenService.accessTokenTtlSeconds,
      UserProfileDto.fromEntity(user),
    );
  }

  /**
   * Get the profile of an authenticated user.
   *
   * @throws UserNoLongerExistsException if the user was deleted after the token was issued
   */
  async getProfile(userId: string): Promise<UserProfileDto> {
    const user = await this.credentialStore.findById(userId);

    if (!user) {
      this.logger.warn(`Profile requested for non-existent user: ${userId}`);
      throw new UserNoLongerExistsException();
    }

    return UserProfileDto.fromEntity(user);
  }

  // ── Private Helpers ───────────────────────────────────────

  private buildTokenResponse(user: User): AuthResponseDto {
    return new AuthResponseDto(
      this.tokenService.issuePair(user.id),
      this.tokenService.accessTokenTtlSeconds,
      UserProfileDto.fromEntity(user),
    );
  }
}

function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}
