import { Injectable, Logger } from '@nestjs/common';
import type { Transcript } from '@scribe/database';
import {
  EngineFailureException,
  EngineTimeoutException,
  PersistenceFailedException,
  TranscriptTooLongException,
} from './exceptions/transcription.exceptions';
import { TranscriptionEngine } from './engine/transcription-engine';
import type { StagedAudio, TranscriptionResult } from './engine/transcription-engine';
import { TranscriptRepository } from './repository/transcript.repository';
import { UploadHandle, withStagedUpload } from './upload/upload-handle';
import { IncomingUpload, UploadStager } from './upload/upload-stager.service';

/** Upper bound on the text a single transcript may hold */
export const MAX_TRANSCRIPT_LENGTH = 1_000_000;

export type PipelineStage =
  | 'received'
  | 'rejected'
  | 'staged'
  | 'transcribing'
  | 'persisted'
  | 'failed';

export interface PipelineOptions {
  /** How long the engine may take before the request fails with a timeout */
  timeoutMs: number;
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * TranscriptionPipeline — turns one upload into one persisted transcript.
 *
 * Stages:
 *   received → rejected                       (stager refused the upload)
 *   received → staged → transcribing → persisted
 *   received → staged → transcribing → failed (engine, timeout or DB error)
 *
 * Guarantees:
 *   - A rejected upload never reaches the engine or the repository
 *   - Exactly one repository write on success, none on any failure before it
 *   - The staged file is removed on every exit once staging succeeded
 *   - The engine is called once; no retries
 */
@Injectable()
export class TranscriptionPipeline {
  private readonly logger = new Logger(TranscriptionPipeline.name);

  constructor(
    private readonly stager: UploadStager,
    private readonly engine: TranscriptionEngine,
    private readonly repository: TranscriptRepository,
  ) {}

  async run(
    upload: IncomingUpload,
    userId: string,
    options: PipelineOptions,
  ): Promise<Transcript> {
    this.advance('received', upload.originalName);

    let handle: UploadHandle;
    try {
      handle = await this.stager.stage(upload);
    } catch (error) {
      this.advance('rejected', upload.originalName);
      throw error;
    }
    this.advance('staged', handle.originalName);

    return withStagedUpload(handle, async (staged) => {
      try {
        this.advance('transcribing', staged.originalName);
        const result = await this.transcribe(staged, options.timeoutMs);

        if (result.text.length > MAX_TRANSCRIPT_LENGTH) {
          throw new TranscriptTooLongException(MAX_TRANSCRIPT_LENGTH);
        }

        const transcript = await this.persist(staged, result, userId);
        this.advance('persisted', staged.originalName);
        return transcript;
      } catch (error) {
        this.advance('failed', staged.originalName);
        throw error;
      }
    });
  }

  /**
   * Calls the engine once, racing it against `timeoutMs`. On timeout the
   * engine's signal is aborted.
   */
  private async transcribe(
    audio: StagedAudio,
    timeoutMs: number,
  ): Promise<TranscriptionResult> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new EngineTimeoutException(timeoutMs));
      }, timeoutMs);
    });

    try {
      return await Promise.race([
        this.engine.transcribe(audio, { signal: controller.signal }),
        timeout,
      ]);
    } catch (error) {
      if (error instanceof EngineTimeoutException) {
        this.logger.warn(
          `Engine timed out after ${timeoutMs} ms on "${audio.originalName}"`,
        );
        throw error;
      }

      const cause = toError(error);
      this.logger.error(
        `Engine failed on "${audio.originalName}": ${cause.message}`,
        cause.stack,
      );
      throw new EngineFailureException(cause);
    } finally {
      clearTimeout(timer);
    }
  }

  private async persist(
    audio: StagedAudio,
    result: TranscriptionResult,
    userId: string,
  ): Promise<Transcript> {
    try {
      return await this.repository.insert({
        userId,
        filename: audio.originalName,
        text: result.text,
        fileSizeBytes: audio.sizeBytes,
        durationSeconds: result.durationSeconds,
      });
    } catch (error) {
      const cause = toError(error);
      this.logger.error(
        `Failed to save transcript of "${audio.originalName}" for user ${userId}: ${cause.message}`,
        cause.stack,
      );
      throw new PersistenceFailedException(cause);
    }
  }

  private advance(stage: PipelineStage, fileName: string): void {
    this.logger.debug(`[${stage}] ${fileName}`);
  }
}
