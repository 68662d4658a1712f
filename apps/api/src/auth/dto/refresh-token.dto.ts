import { IsNotEmpty, IsString } from 'class-validator';

/**
 * DTO for POST /auth/refresh. Field name follows the OAuth2 token
 * request convention.
 */
export class RefreshTokenDto {
  @IsString()
  @IsNotEmpty({ message: 'refresh_token is required' })
  refresh_token!: string;
}
