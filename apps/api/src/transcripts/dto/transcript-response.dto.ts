import type { Transcript } from '@scribe/database';

/**
 * A transcript as returned to its owner. The owner id is implied by the
 * request and not repeated.
 */
export class TranscriptResponseDto {
  id: string;
  filename: string;
  text: string;
  fileSizeBytes: number;
  durationSeconds: number | null;
  createdAt: Date;

  private constructor(transcript: Transcript) {
    this.id = transcript.id;
    this.filename = transcript.filename;
    this.text = transcript.transcription;
    this.fileSizeBytes = Number.parseInt(transcript.fileSize, 10);
    this.durationSeconds = transcript.durationSeconds;
    this.createdAt = transcript.createdAt;
  }

  static fromEntity(transcript: Transcript): TranscriptResponseDto {
    return new TranscriptResponseDto(transcript);
  }
}
