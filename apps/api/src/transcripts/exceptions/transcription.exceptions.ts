import { HttpException, HttpStatus, NotFoundException } from '@nestjs/common';

/**
 * The transcription engine failed. Full context is logged by the pipeline;
 * the caller only sees a stable code.
 * Maps to HTTP 500 Internal Server Error.
 */
export class EngineFailureException extends HttpException {
  constructor(cause: Error) {
    super(
      {
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        error: 'Internal Server Error',
        code: 'TRANSCRIPTION_FAILED',
        message: 'Transcription failed. Please try again.',
      },
      HttpStatus.INTERNAL_SERVER_ERROR,
      { cause },
    );
  }
}

/**
 * The engine did not answer within the caller-supplied timeout.
 * Maps to HTTP 500 Internal Server Error.
 */
export class EngineTimeoutException extends HttpException {
  constructor(timeoutMs: number) {
    super(
      {
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        error: 'Internal Server Error',
        code: 'TRANSCRIPTION_TIMEOUT',
        message: `Transcription did not complete within ${timeoutMs} ms`,
      },
      HttpStatus.INTERNAL_SERVER_ERROR,
    );
  }
}

/**
 * The engine returned more text than a transcript may hold.
 * Maps to HTTP 422 Unprocessable Entity.
 */
export class TranscriptTooLongException extends HttpException {
  constructor(maxLength: number) {
    super(
      {
        statusCode: HttpStatus.UNPROCESSABLE_ENTITY,
        error: 'Unprocessable Entity',
        code: 'TRANSCRIPT_TOO_LONG',
        message: `Transcript exceeds ${maxLength} characters`,
      },
      HttpStatus.UNPROCESSABLE_ENTITY,
    );
  }
}

/**
 * Transcription succeeded but the record could not be written.
 * Wraps the database error without leaking it.
 * Maps to HTTP 500 Internal Server Error.
 */
export class PersistenceFailedException extends HttpException {
  constructor(cause: Error) {
    super(
      {
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        error: 'Internal Server Error',
        code: 'PERSISTENCE_FAILED',
        message: 'Failed to save transcript. Please try again.',
      },
      HttpStatus.INTERNAL_SERVER_ERROR,
      { cause },
    );
  }
}

/**
 * No transcript with this ID is owned by the caller. Returned for other
 * users' transcripts too, so existence is never confirmed to non-owners.
 */
export class TranscriptNotFoundException extends NotFoundException {
  constructor(transcriptId: string) {
    super({
      statusCode: HttpStatus.NOT_FOUND,
      error: 'Not Found',
      code: 'TRANSCRIPT_NOT_FOUND',
      message: `Transcript ${transcriptId} not found`,
    });
  }
}
