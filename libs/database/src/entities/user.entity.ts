import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  OneToMany,
  Index,
} from 'typeorm';
import { Transcript } from './transcript.entity';

/**
 * User entity — an account that can authenticate and own transcripts.
 *
 * Invariants:
 * - Email is unique across all users and stored lower-cased
 * - Password is stored as an argon2 hash, never in plaintext
 * - Deleting a user cascades to all their transcripts
 */
@Entity('users')
export class User {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index('IDX_users_email', { unique: true })
  @Column({ type: 'varchar', length: 255, unique: true })
  email!: string;

  @Column({ type: 'varchar', length: 255, name: 'password_hash' })
  passwordHash!: string;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz', name: 'updated_at' })
  updatedAt!: Date;

  // ── Relations ────────────────────────────────────────────

  @OneToMany(() => Transcript, (transcript) => transcript.owner, {
    cascade: false,
  })
  transcripts!: Transcript[];
}
