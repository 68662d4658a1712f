export { RegisterDto } from './register.dto';
export { LoginDto } from './login.dto';
export { RefreshTokenDto } from './refresh-token.dto';
export { AuthResponseDto } from './auth-response.dto';
export { UserProfileDto } from './user-profile.dto';
