import { existsSync } from 'fs';
import { mkdtemp, readdir, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { Readable } from 'stream';
import { loadScribeConfig } from '../../config/scribe.config';
import {
  EmptyUploadException,
  FileTooLargeException,
  StreamTruncatedException,
  UnsupportedFormatException,
} from '../exceptions/upload.exceptions';
import { UploadStager } from './upload-stager.service';

const MAX_BYTES = 16;

function bytes(content: string): Readable {
  return Readable.from([Buffer.from(content)]);
}

describe('UploadStager', () => {
  let scratchDir: string;
  let stager: UploadStager;

  beforeEach(async () => {
    scratchDir = await mkdtemp(join(tmpdir(), 'scribe-stager-'));
    stager = new UploadStager(
      loadScribeConfig({
        JWT_SECRET: 'test-secret',
        SCRATCH_DIR: scratchDir,
        MAX_UPLOAD_BYTES: String(MAX_BYTES),
      }),
    );
    await stager.onModuleInit();
  });

  afterEach(async () => {
    await rm(scratchDir, { recursive: true, force: true });
  });

  it('writes an accepted upload into the scratch directory', async () => {
    const handle = await stager.stage({
      originalName: 'clip.wav',
      mimeType: 'audio/wav',
      declaredSize: 10,
      stream: bytes('0123456789'),
    });

    expect(dirname(handle.path)).toBe(scratchDir);
    expect(handle.path.endsWith('.wav')).toBe(true);
    expect(handle.originalName).toBe('clip.wav');
    expect(handle.format).toBe('wav');
    expect(handle.sizeBytes).toBe(10);
    await expect(readFile(handle.path, 'utf8')).resolves.toBe('0123456789');

    await handle.release();
    await expect(readdir(scratchDir)).resolves.toEqual([]);
  });

  it('gives every upload its own file', async () => {
    const first = await stager.stage({
      originalName: 'clip.wav',
      declaredSize: null,
      stream: bytes('first'),
    });
    const second = await stager.stage({
      originalName: 'clip.wav',
      declaredSize: null,
      stream: bytes('second'),
    });

    expect(first.path).not.toBe(second.path);
    await first.release();
    await second.release();
  });

  it('resolves the format from the MIME type when the name has no extension', async () => {
    const handle = await stager.stage({
      originalName: 'recording',
      mimeType: 'audio/mpeg',
      declaredSize: null,
      stream: bytes('id3'),
    });

    expect(handle.format).toBe('mp3');
    await handle.release();
  });

  it('rejects a declared size over the limit without reading the body', async () => {
    const stream = bytes('0123456789');

    await expect(
      stager.stage({ originalName: 'clip.wav', declaredSize: MAX_BYTES + 1, stream }),
    ).rejects.toBeInstanceOf(FileTooLargeException);
    await expect(readdir(scratchDir)).resolves.toEqual([]);
  });

  it('rejects a body larger than an understated declared size', async () => {
    await expect(
      stager.stage({ originalName: 'clip.wav', declaredSize: 4, stream: bytes('0123456789') }),
    ).rejects.toBeInstanceOf(FileTooLargeException);
    await expect(readdir(scratchDir)).resolves.toEqual([]);
  });

  it('rejects an undeclared body that streams past the limit', async () => {
    await expect(
      stager.stage({
        originalName: 'clip.wav',
        declaredSize: null,
        stream: bytes('x'.repeat(MAX_BYTES + 1)),
      }),
    ).rejects.toBeInstanceOf(FileTooLargeException);
    await expect(readdir(scratchDir)).resolves.toEqual([]);
  });

  it('accepts a body of exactly the limit', async () => {
    const handle = await stager.stage({
      originalName: 'clip.wav',
      declaredSize: null,
      stream: bytes('x'.repeat(MAX_BYTES)),
    });

    expect(handle.sizeBytes).toBe(MAX_BYTES);
    await handle.release();
  });

  it('rejects a format outside the allowed set', async () => {
    await expect(
      stager.stage({ originalName: 'notes.txt', declaredSize: 5, stream: bytes('hello') }),
    ).rejects.toBeInstanceOf(UnsupportedFormatException);
    await expect(readdir(scratchDir)).resolves.toEqual([]);
  });

  it('removes the partial file when the stream breaks', async () => {
    const stream = new Readable({ read() {} });
    stream.push(Buffer.from('0123'));
    setImmediate(() => stream.destroy(new Error('socket hang up')));

    await expect(
      stager.stage({ originalName: 'clip.wav', declaredSize: null, stream }),
    ).rejects.toBeInstanceOf(StreamTruncatedException);
    await expect(readdir(scratchDir)).resolves.toEqual([]);
  });

  it('rejects an empty upload', async () => {
    await expect(
      stager.stage({ originalName: 'clip.wav', declaredSize: 0, stream: Readable.from([]) }),
    ).rejects.toBeInstanceOf(EmptyUploadException);
    await expect(readdir(scratchDir)).resolves.toEqual([]);
  });

  it('creates a missing scratch directory on startup', async () => {
    const nested = join(scratchDir, 'a', 'b');
    const nestedStager = new UploadStager(
      loadScribeConfig({ JWT_SECRET: 'test-secret', SCRATCH_DIR: nested }),
    );

    await nestedStager.onModuleInit();

    expect(existsSync(nested)).toBe(true);
  });
});
