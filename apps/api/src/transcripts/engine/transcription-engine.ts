/** What the engine needs to know about a staged upload. */
export interface StagedAudio {
  path: string;
  originalName: string;
  format: string;
  sizeBytes: number;
}

export interface TranscriptionResult {
  text: string;
  /** Audio length when the engine reports it */
  durationSeconds: number | null;
}

export interface TranscribeOptions {
  /** Aborted when the caller gives up; implementations should stop work. */
  signal: AbortSignal;
}

/**
 * Speech-to-text capability. The pipeline only talks to this class, so
 * tests can bind a deterministic stand-in.
 *
 * Implementations must not retry on their own.
 */
export abstract class TranscriptionEngine {
  abstract transcribe(
    audio: StagedAudio,
    options: TranscribeOptions,
  ): Promise<TranscriptionResult>;
}
