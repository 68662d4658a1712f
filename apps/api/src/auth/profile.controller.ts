import { Controller, Get, UseGuards } from '@nestjs/common';
import { AuthService } from './auth.service';
import { UserProfileDto } from './dto';
import { JwtAuthGuard } from './guards';
import { CurrentUser } from './decorators';
import type { RequestUser } from './interfaces';

/**
 * GET /me — the authenticated user's summary.
 */
@Controller('me')
export class ProfileController {
  constructor(private readonly authService: AuthService) {}

  /**
   * @returns 200 OK with user profile (no passwordHash)
   * @throws 401 Unauthorized if token is missing/invalid/expired
   */
  @Get()
  @UseGuards(JwtAuthGuard)
  async getProfile(@CurrentUser() user: RequestUser): Promise<UserProfileDto> {
    return this.authService.getProfile(user.userId);
  }
}
