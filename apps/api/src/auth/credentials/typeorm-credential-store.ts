import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { QueryFailedError, Repository } from 'typeorm';
import { User } from '@scribe/database';
import { EmailAlreadyExistsException } from '../exceptions/email-already-exists.exception';
import { CredentialStore, NewUserRecord } from './credential-store';

/** PostgreSQL SQLSTATE for unique_violation */
const PG_UNIQUE_VIOLATION = '23505';

/**
 * CredentialStore backed by the `users` table.
 */
@Injectable()
export class TypeOrmCredentialStore extends CredentialStore {
  private readonly logger = new Logger(TypeOrmCredentialStore.name);

  constructor(
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
  ) {
    super();
  }

  async findByEmail(email: string): Promise<User | null> {
    return this.userRepository.findOne({ where: { email } });
  }

  async findById(id: string): Promise<User | null> {
    return this.userRepository.findOne({ where: { id } });
  }

  async create(record: NewUserRecord): Promise<User> {
    const user = this.userRepository.create({
      email: record.email,
      passwordHash: record.passwordHash,
    });

    try {
      return await this.userRepository.save(user);
    } catch (error) {
      if (
        error instanceof QueryFailedError &&
        isUniqueViolation(error.driverError)
      ) {
        this.logger.warn('Concurrent registration lost the race for an email');
        throw new EmailAlreadyExistsException(record.email);
      }
      throw error;
    }
  }
}

function isUniqueViolation(driverError: unknown): boolean {
  return (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    driverError.code === PG_UNIQUE_VIOLATION
  );
}
