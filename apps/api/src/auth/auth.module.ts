import { Module } from '@nestjs/common';
import { JwtModule } from '@nestjs/jwt';
import type { JwtModuleOptions } from '@nestjs/jwt';
import { TypeOrmModule } from '@nestjs/typeorm';
import { User } from '@scribe/database';
import { scribeConfig } from '../config/scribe.config';
import type { ScribeConfig } from '../config/scribe.config';
import { CLOCK, systemClock } from '../common/clock';
import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import { ProfileController } from './profile.controller';
import { TokenService } from './token.service';
import { PasswordHasher } from './password-hasher.service';
import { JwtAuthGuard } from './guards';
import { CredentialStore, TypeOrmCredentialStore } from './credentials';

/**
 * JWT settings shared by the module and by tests that assemble the
 * auth providers by hand. Expiry is written into each payload by
 * TokenService, so no `expiresIn` here.
 */
export function jwtModuleOptions(config: ScribeConfig): JwtModuleOptions {
  return {
    secret: config.auth.jwtSecret,
    signOptions: { algorithm: 'HS256' },
    verifyOptions: { algorithms: ['HS256'] },
  };
}

/**
 * AuthModule — encapsulates all authentication concerns.
 *
 * Provides:
 * - Password hashing and the user credential store
 * - Access/refresh token issuing and validation
 * - JwtAuthGuard for route protection in other modules
 * - REST endpoints for register/login/refresh and GET /me
 *
 * Feature modules that use @UseGuards(JwtAuthGuard) import this module so
 * the guard can resolve TokenService.
 */
@Module({
  imports: [
    TypeOrmModule.forFeature([User]),
    JwtModule.registerAsync({
      inject: [scribeConfig.KEY],
      useFactory: (config: ScribeConfig) => jwtModuleOptions(config),
    }),
  ],
  controllers: [AuthController, ProfileController],
  providers: [
    AuthService,
    TokenService,
    PasswordHasher,
    JwtAuthGuard,
    { provide: CredentialStore, useClass: TypeOrmCredentialStore },
    { provide: CLOCK, useValue: systemClock },
  ],
  exports: [TokenService, JwtAuthGuard],
})
export class AuthModule {}
