import type { TokenPair } from '../interfaces/token-claims.interface';
import { UserProfileDto } from './user-profile.dto';

/**
 * Response shape for login and refresh.
 *
 * Follows the OAuth2 token response convention (snake_case keys,
 * `expires_in` in seconds of the access token's lifetime).
 */
export class AuthResponseDto {
  access_token: string;
  refresh_token: string;
  token_type: 'Bearer';
  expires_in: number;
  user: UserProfileDto;

  constructor(pair: TokenPair, expiresIn: number, user: UserProfileDto) {
    this.access_token = pair.accessToken;
    this.refresh_token = pair.refreshToken;
    this.token_type = 'Bearer';
    this.expires_in = expiresIn;
    this.user = user;
  }
}
