import { Logger } from '@nestjs/common';
import { rm } from 'fs/promises';

const logger = new Logger('UploadHandle');

/**
 * A staged upload on disk. Owned by exactly one request; the file is
 * removed by release(), which is idempotent.
 */
export class UploadHandle {
  private released = false;

  constructor(
    readonly path: string,
    readonly originalName: string,
    readonly format: string,
    readonly sizeBytes: number,
  ) {}

  get isReleased(): boolean {
    return this.released;
  }

  async release(): Promise<void> {
    if (this.released) {
      return;
    }
    this.released = true;
    await rm(this.path, { force: true });
  }
}

/**
 * Run `body` with a staged upload and release the file when the scope
 * ends, however it ends.
 *
 * If `body` throws, a failure to remove the file is logged and the
 * original error is rethrown. If `body` succeeds, a removal failure
 * propagates.
 */
export async function withStagedUpload<T>(
  handle: UploadHandle,
  body: (handle: UploadHandle) => Promise<T>,
): Promise<T> {
  let result: T;

  try {
    result = await body(handle);
  } catch (error) {
    try {
      await handle.release();
    } catch (cleanupError) {
      const message =
        cleanupError instanceof Error ? cleanupError.message : String(cleanupError);
      logger.error(`Failed to remove staged upload ${handle.path}: ${message}`);
    }
    throw error;
  }

  await handle.release();
  return result;
}
