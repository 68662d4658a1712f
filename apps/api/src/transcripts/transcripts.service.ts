import { Injectable, Logger } from '@nestjs/common';
import { TranscriptRepository } from './repository/transcript.repository';
import { TranscriptNotFoundException } from './exceptions/transcription.exceptions';
import { PaginatedTranscriptsDto, TranscriptResponseDto } from './dto';

/**
 * Read and delete access to a user's own transcripts.
 */
@Injectable()
export class TranscriptsService {
  private readonly logger = new Logger(TranscriptsService.name);

  constructor(private readonly repository: TranscriptRepository) {}

  async list(
    userId: string,
    page: number,
    limit: number,
  ): Promise<PaginatedTranscriptsDto> {
    const { items, total } = await this.repository.list(userId, page, limit);
    return new PaginatedTranscriptsDto(
      items.map((item) => TranscriptResponseDto.fromEntity(item)),
      page,
      limit,
      total,
    );
  }

  /**
   * @throws TranscriptNotFoundException if the id is unknown or owned by someone else
   */
  async get(userId: string, transcriptId: string): Promise<TranscriptResponseDto> {
    const transcript = await this.repository.get(transcriptId, userId);
    if (!transcript) {
      throw new TranscriptNotFoundException(transcriptId);
    }
    return TranscriptResponseDto.fromEntity(transcript);
  }

  /**
   * @throws TranscriptNotFoundException if the id is unknown or owned by someone else
   */
  async delete(userId: string, transcriptId: string): Promise<void> {
    const removed = await this.repository.delete(transcriptId, userId);
    if (!removed) {
      throw new TranscriptNotFoundException(transcriptId);
    }
    this.logger.log(`Transcript ${transcriptId} deleted by user ${userId}`);
  }
}
