import {
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Inject,
  Logger,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
  Req,
  UseGuards,
} from '@nestjs/common';
import { JwtAuthGuard, CurrentUser } from '../auth';
import type { AuthenticatedRequest, RequestUser } from '../auth';
import { scribeConfig } from '../config/scribe.config';
import type { ScribeConfig } from '../config/scribe.config';
import { TranscriptionPipeline } from './transcription-pipeline.service';
import { TranscriptsService } from './transcripts.service';
import { readAudioPart } from './upload/multipart-audio';
import {
  ListTranscriptsQueryDto,
  PaginatedTranscriptsDto,
  TranscriptResponseDto,
} from './dto';

/** Multipart field that carries the audio file */
export const AUDIO_FIELD_NAME = 'audio';

/**
 * REST controller for transcripts.
 *
 * Routes:
 *   POST   /transcripts      — Upload audio and transcribe it
 *   GET    /transcripts      — List own transcripts, newest first
 *   GET    /transcripts/:id  — Fetch one transcript
 *   DELETE /transcripts/:id  — Delete one transcript
 *
 * All routes require a valid access token (Authorization: Bearer <token>).
 */
@Controller('transcripts')
@UseGuards(JwtAuthGuard)
export class TranscriptsController {
  private readonly logger = new Logger(TranscriptsController.name);

  constructor(
    private readonly pipeline: TranscriptionPipeline,
    private readonly transcriptsService: TranscriptsService,
    @Inject(scribeConfig.KEY) private readonly config: ScribeConfig,
  ) {}

  /**
   * POST /transcripts
   *
   * Body: multipart/form-data with the audio file in the "audio" field.
   * The file is streamed to disk, never buffered in memory.
   *
   * Error responses:
   *   400 — Not multipart, no "audio" file, empty or truncated upload
   *   401 — Missing or invalid access token
   *   413 — File exceeds the size limit
   *   422 — Unsupported format, or transcript too long
   *   500 — Engine failure, engine timeout, or DB write failure
   */
  @Post()
  @HttpCode(HttpStatus.CREATED)
  async upload(@Req() req: AuthenticatedRequest): Promise<TranscriptResponseDto> {
    const { userId } = req.user;
    const upload = await readAudioPart(req, AUDIO_FIELD_NAME);

    this.logger.log(
      `Upload request from user ${userId}: file="${upload.originalName}", ` +
        `declared=${upload.declaredSize ?? 'unknown'}`,
    );

    const transcript = await this.pipeline.run(upload, userId, {
      timeoutMs: this.config.transcription.timeoutMs,
    });
    return TranscriptResponseDto.fromEntity(transcript);
  }

  @Get()
  async list(
    @CurrentUser() user: RequestUser,
    @Query() query: ListTranscriptsQueryDto,
  ): Promise<PaginatedTranscriptsDto> {
    return this.transcriptsService.list(user.userId, query.page, query.limit);
  }

  @Get(':id')
  async get(
    @CurrentUser() user: RequestUser,
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<TranscriptResponseDto> {
    return this.transcriptsService.get(user.userId, id);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async delete(
    @CurrentUser() user: RequestUser,
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<void> {
    await this.transcriptsService.delete(user.userId, id);
  }
}
