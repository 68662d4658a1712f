import { Inject, Injectable, Logger } from '@nestjs/common';
import { HealthCheckError, HealthIndicator } from '@nestjs/terminus';
import type { HealthIndicatorResult } from '@nestjs/terminus';
import { constants } from 'fs';
import { access } from 'fs/promises';
import { scribeConfig } from '../config/scribe.config';
import type { ScribeConfig } from '../config/scribe.config';

/**
 * Reports whether uploads can still be staged. The status is public, so
 * the directory and the filesystem error only go to the log.
 */
@Injectable()
export class ScratchDirHealthIndicator extends HealthIndicator {
  private readonly logger = new Logger(ScratchDirHealthIndicator.name);

  constructor(@Inject(scribeConfig.KEY) private readonly config: ScribeConfig) {
    super();
  }

  async isWritable(key: string): Promise<HealthIndicatorResult> {
    const path = this.config.uploads.scratchDir;

    try {
      await access(path, constants.W_OK);
      return this.getStatus(key, true);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Scratch directory ${path} is not writable: ${message}`);
      throw new HealthCheckError(
        'Scratch directory is not writable',
        this.getStatus(key, false, { message: 'not writable' }),
      );
    }
  }
}
