import type { Transcript } from '@scribe/database';

export interface NewTranscript {
  userId: string;
  filename: string;
  text: string;
  fileSizeBytes: number;
  durationSeconds: number | null;
}

export interface TranscriptPage {
  items: Transcript[];
  total: number;
}

/**
 * Storage for transcripts. Every read and delete is scoped by owner: a
 * transcript that exists but belongs to someone else is reported the same
 * way as one that does not exist.
 */
export abstract class TranscriptRepository {
  /** Persists a new transcript in a single write and returns it with its id. */
  abstract insert(record: NewTranscript): Promise<Transcript>;

  abstract get(id: string, ownerId: string): Promise<Transcript | null>;

  /** Newest first. `page` is 1-based. */
  abstract list(ownerId: string, page: number, limit: number): Promise<TranscriptPage>;

  /** @returns whether a transcript owned by `ownerId` was removed */
  abstract delete(id: string, ownerId: string): Promise<boolean>;
}
