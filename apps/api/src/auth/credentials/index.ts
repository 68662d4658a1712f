export { CredentialStore } from './credential-store';
export type { NewUserRecord } from './credential-store';
export { TypeOrmCredentialStore } from './typeorm-credential-store';
