import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Transcript } from '@scribe/database';
import { AuthModule } from '../auth/auth.module';
import { TranscriptsController } from './transcripts.controller';
import { TranscriptsService } from './transcripts.service';
import { TranscriptionPipeline } from './transcription-pipeline.service';
import { UploadStager } from './upload/upload-stager.service';
import { TranscriptionEngine } from './engine/transcription-engine';
import { OpenAiTranscriptionEngine } from './engine/openai-transcription.engine';
import { TranscriptRepository } from './repository/transcript.repository';
import { TypeOrmTranscriptRepository } from './repository/typeorm-transcript.repository';

@Module({
  imports: [AuthModule, TypeOrmModule.forFeature([Transcript])],
  controllers: [TranscriptsController],
  providers: [
    TranscriptsService,
    TranscriptionPipeline,
    UploadStager,
    { provide: TranscriptionEngine, useClass: OpenAiTranscriptionEngine },
    { provide: TranscriptRepository, useClass: TypeOrmTranscriptRepository },
  ],
})
export class TranscriptsModule {}
