import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { User } from './user.entity';

/**
 * Transcript entity — the text produced from one uploaded audio file.
 *
 * Invariants:
 * - Every transcript belongs to exactly one user (owner) and is only
 *   ever read or deleted through a query scoped by that owner
 * - Immutable after insert; the only mutation is a hard delete
 * - duration_seconds is null when the engine did not report a duration
 */
@Entity('transcripts')
@Index('IDX_transcripts_user_created', ['userId', 'createdAt'])
export class Transcript {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index('IDX_transcripts_user_id')
  @Column({ type: 'uuid', name: 'user_id' })
  userId!: string;

  @Column({ type: 'varchar', length: 255 })
  filename!: string;

  @Column({ type: 'text' })
  transcription!: string;

  @Column({ type: 'bigint', name: 'file_size' })
  fileSize!: string; // bigint stored as string by pg driver

  @Column({ type: 'double precision', name: 'duration_seconds', nullable: true })
  durationSeconds!: number | null;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  // ── Relations ────────────────────────────────────────────

  @ManyToOne(() => User, (user) => user.transcripts, {
    onDelete: 'CASCADE',
    nullable: false,
  })
  @JoinColumn({ name: 'user_id' })
  owner!: User;
}
