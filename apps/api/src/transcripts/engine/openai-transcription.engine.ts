import { Inject, Injectable, Logger } from '@nestjs/common';
import { createReadStream } from 'fs';
import OpenAI from 'openai';
import { scribeConfig } from '../../config/scribe.config';
import type { ScribeConfig } from '../../config/scribe.config';
import {
  StagedAudio,
  TranscribeOptions,
  TranscriptionEngine,
  TranscriptionResult,
} from './transcription-engine';

/**
 * Transcribes staged audio through OpenAI's audio transcription endpoint.
 *
 * Client-side retries are disabled: a retried upload may be billed and
 * processed twice, and the pipeline reports failures once.
 */
@Injectable()
export class OpenAiTranscriptionEngine extends TranscriptionEngine {
  private readonly logger = new Logger(OpenAiTranscriptionEngine.name);
  private readonly client: OpenAI | null;
  private readonly model: string;

  constructor(@Inject(scribeConfig.KEY) config: ScribeConfig) {
    super();
    this.model = config.transcription.model;

    if (config.transcription.openaiApiKey === null) {
      this.logger.warn(
        'OPENAI_API_KEY is not set; every transcription request will fail',
      );
      this.client = null;
    } else {
      this.client = new OpenAI({
        apiKey: config.transcription.openaiApiKey,
        maxRetries: 0,
      });
      this.logger.log(`OpenAI transcription engine ready (model=${this.model})`);
    }
  }

  async transcribe(
    audio: StagedAudio,
    options: TranscribeOptions,
  ): Promise<TranscriptionResult> {
    if (this.client === null) {
      throw new Error('Transcription engine is not configured: OPENAI_API_KEY is missing');
    }

    this.logger.debug(
      `Sending "${audio.originalName}" (${audio.sizeBytes} bytes) to ${this.model}`,
    );

    const response = await this.client.audio.transcriptions.create(
      {
        file: createReadStream(audio.path),
        model: this.model,
        response_format: 'json',
      },
      { signal: options.signal },
    );

    return { text: response.text, durationSeconds: null };
  }
}
