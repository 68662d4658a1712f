export { EmailAlreadyExistsException } from './email-already-exists.exception';
export { InvalidCredentialsException } from './invalid-credentials.exception';
export { MalformedPasswordHashError } from './malformed-password-hash.error';
export { UserNoLongerExistsException } from './user-no-longer-exists.exception';
export {
  TokenValidationException,
  InvalidTokenSignatureException,
  TokenExpiredException,
  WrongTokenKindException,
  UnauthorizedRequestException,
} from './token.exceptions';
export type { TokenFailureReason } from './token.exceptions';
