import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { constants, createWriteStream } from 'fs';
import { access, mkdir, rm } from 'fs/promises';
import { join } from 'path';
import { randomUUID } from 'crypto';
import { Readable, Transform, TransformCallback } from 'stream';
import { pipeline } from 'stream/promises';
import { scribeConfig } from '../../config/scribe.config';
import type { ScribeConfig } from '../../config/scribe.config';
import {
  EmptyUploadException,
  FileTooLargeException,
  StreamTruncatedException,
  UnsupportedFormatException,
} from '../exceptions/upload.exceptions';
import { resolveAudioFormat } from './audio-formats';
import { UploadHandle } from './upload-handle';

/**
 * An upload as it arrives: metadata plus the not-yet-consumed byte stream.
 */
export interface IncomingUpload {
  originalName: string;
  mimeType?: string;
  /** Content-Length the client declared; null when it sent none */
  declaredSize: number | null;
  stream: Readable;
}

class ByteLimitExceededError extends Error {
  constructor(readonly limit: number) {
    super(`Stream exceeded ${limit} bytes`);
    this.name = 'ByteLimitExceededError';
  }
}

/** Pass-through that counts bytes and fails once `limit` is crossed. */
class ByteCounter extends Transform {
  bytes = 0;

  constructor(private readonly limit: number) {
    super();
  }

  _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.bytes += chunk.length;
    if (this.bytes > this.limit) {
      callback(new ByteLimitExceededError(this.limit));
      return;
    }
    callback(null, chunk);
  }
}

/**
 * UploadStager — validates an incoming upload and writes it to a uniquely
 * named file in the scratch directory.
 *
 * Checks, in order:
 *   1. Declared size ≤ limit (before a single body byte is read)
 *   2. Format in the allowed set
 *   3. Bytes actually streamed ≤ min(declared size, limit), so an
 *      understated Content-Length cannot sneak a larger file through
 *
 * Every rejection leaves no file behind.
 */
@Injectable()
export class UploadStager implements OnModuleInit {
  private readonly logger = new Logger(UploadStager.name);
  private readonly maxBytes: number;
  private readonly allowedFormats: readonly string[];
  private readonly scratchDir: string;

  constructor(@Inject(scribeConfig.KEY) config: ScribeConfig) {
    this.maxBytes = config.uploads.maxBytes;
    this.allowedFormats = config.uploads.allowedFormats;
    this.scratchDir = config.uploads.scratchDir;
  }

  /**
   * Creates the scratch directory and fails startup if it is not writable.
   */
  async onModuleInit(): Promise<void> {
    await mkdir(this.scratchDir, { recursive: true });
    await access(this.scratchDir, constants.W_OK);
    this.logger.log(`Staging uploads in ${this.scratchDir}`);
  }

  /**
   * @throws FileTooLargeException if the declared or streamed size is over the limit
   * @throws UnsupportedFormatException if the format is not allowed
   * @throws StreamTruncatedException if the stream errors or closes early
   * @throws EmptyUploadException if the stream carried no bytes
   */
  async stage(upload: IncomingUpload): Promise<UploadHandle> {
    // ── 1. Declared size ───────────────────────────────────
    if (upload.declaredSize !== null && upload.declaredSize > this.maxBytes) {
      this.discard(upload.stream);
      throw new FileTooLargeException(this.maxBytes);
    }

    // ── 2. Format ──────────────────────────────────────────
    const format = resolveAudioFormat(upload.originalName, upload.mimeType);
    if (!this.allowedFormats.includes(format)) {
      this.discard(upload.stream);
      throw new UnsupportedFormatException(
        format || upload.mimeType || 'unknown',
        this.allowedFormats,
      );
    }

    // ── 3. Stream to disk under the byte limit ─────────────
    const limit =
      upload.declaredSize === null
        ? this.maxBytes
        : Math.min(upload.declaredSize, this.maxBytes);
    const counter = new ByteCounter(limit);
    const path = join(this.scratchDir, `${randomUUID()}.${format}`);

    try {
      await pipeline(upload.stream, counter, createWriteStream(path, { flags: 'wx' }));
    } catch (error) {
      await rm(path, { force: true });

      if (error instanceof ByteLimitExceededError) {
        throw new FileTooLargeException(this.maxBytes);
      }

      const cause = error instanceof Error ? error : new Error(String(error));
      this.logger.warn(`Upload "${upload.originalName}" truncated: ${cause.message}`);
      throw new StreamTruncatedException(cause);
    }

    if (counter.bytes === 0) {
      await rm(path, { force: true });
      throw new EmptyUploadException();
    }

    this.logger.debug(`Staged "${upload.originalName}" (${counter.bytes} bytes)`);
    return new UploadHandle(path, upload.originalName, format, counter.bytes);
  }

  /** Drain a stream we are not going to store so the request can finish. */
  private discard(stream: Readable): void {
    stream.resume();
  }
}
