import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Transcript } from '@scribe/database';
import {
  NewTranscript,
  TranscriptPage,
  TranscriptRepository,
} from './transcript.repository';

@Injectable()
export class TypeOrmTranscriptRepository extends TranscriptRepository {
  constructor(
    @InjectRepository(Transcript)
    private readonly transcriptRepository: Repository<Transcript>,
  ) {
    super();
  }

  async insert(record: NewTranscript): Promise<Transcript> {
    const transcript = this.transcriptRepository.create({
      userId: record.userId,
      filename: record.filename,
      transcription: record.text,
      fileSize: String(record.fileSizeBytes),
      durationSeconds: record.durationSeconds,
    });

    return this.transcriptRepository.save(transcript);
  }

  async get(id: string, ownerId: string): Promise<Transcript | null> {
    return this.transcriptRepository.findOne({
      where: { id, userId: ownerId },
    });
  }

  async list(ownerId: string, page: number, limit: number): Promise<TranscriptPage> {
    const [items, total] = await this.transcriptRepository.findAndCount({
      where: { userId: ownerId },
      order: { createdAt: 'DESC', id: 'DESC' },
      skip: (page - 1) * limit,
      take: limit,
    });

    return { items, total };
  }

  async delete(id: string, ownerId: string): Promise<boolean> {
    const result = await this.transcriptRepository.delete({
      id,
      userId: ownerId,
    });

    return (result.affected ?? 0) > 0;
  }
}
