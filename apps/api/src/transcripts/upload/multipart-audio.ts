import busboy from 'busboy';
import type { Request } from 'express';
import type { Readable } from 'stream';
import {
  MalformedMultipartException,
  MissingFileException,
} from '../exceptions/upload.exceptions';
import type { IncomingUpload } from './upload-stager.service';

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Reads a `Content-Length` value as a byte count. Anything other than a
 * plain non-negative integer counts as undeclared.
 */
export function parseContentLength(header: string | undefined): number | null {
  if (header === undefined || !/^\d+$/.test(header.trim())) {
    return null;
  }
  const parsed = Number(header);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

/**
 * Parses a multipart/form-data request without buffering it and resolves
 * with the first file part named `fieldName`, its body still unread.
 *
 * Other parts are drained. If the client disconnects while the file is
 * still streaming, the file stream is destroyed so whoever reads it sees
 * the truncation.
 *
 * @throws MalformedMultipartException if the body is not valid multipart
 * @throws MissingFileException if the body ends without the expected file
 */
export function readAudioPart(
  request: Request,
  fieldName: string,
): Promise<IncomingUpload> {
  return new Promise<IncomingUpload>((resolve, reject) => {
    let parser: busboy.Busboy;
    try {
      parser = busboy({ headers: request.headers });
    } catch (error) {
      reject(new MalformedMultipartException(toError(error)));
      return;
    }

    let settled = false;
    let activeStream: Readable | null = null;

    parser.on('file', (name, stream, info) => {
      if (settled || name !== fieldName) {
        stream.resume();
        return;
      }

      settled = true;
      activeStream = stream;
      resolve({
        originalName: info.filename,
        mimeType: info.mimeType,
        declaredSize: parseContentLength(request.headers['content-length']),
        stream,
      });
    });

    parser.on('error', (error: unknown) => {
      if (!settled) {
        settled = true;
        reject(new MalformedMultipartException(toError(error)));
        return;
      }
      activeStream?.destroy(toError(error));
    });

    parser.on('close', () => {
      if (!settled) {
        settled = true;
        reject(new MissingFileException(fieldName));
      }
    });

    request.once('close', () => {
      if (!request.complete) {
        activeStream?.destroy(new Error('Client disconnected before the upload completed'));
      }
    });

    request.pipe(parser);
  });
}
