import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Thrown when the upload is larger than the configured limit, whether
 * detected from the declared Content-Length or while streaming.
 * Maps to HTTP 413 Content Too Large.
 */
export class FileTooLargeException extends HttpException {
  constructor(maxBytes: number) {
    super(
      {
        statusCode: HttpStatus.PAYLOAD_TOO_LARGE,
        error: 'Payload Too Large',
        code: 'UPLOAD_TOO_LARGE',
        message: `File exceeds the maximum allowed size of ${maxBytes} bytes`,
      },
      HttpStatus.PAYLOAD_TOO_LARGE,
    );
  }
}

/**
 * Thrown when the file's extension (or MIME type, for names without one)
 * is not in the allowed set. Maps to HTTP 422 Unprocessable Entity.
 */
export class UnsupportedFormatException extends HttpException {
  constructor(received: string, allowed: readonly string[]) {
    super(
      {
        statusCode: HttpStatus.UNPROCESSABLE_ENTITY,
        error: 'Unprocessable Entity',
        code: 'UNSUPPORTED_FORMAT',
        message: `Audio format "${received}" is not supported. Allowed formats: ${allowed.join(', ')}`,
      },
      HttpStatus.UNPROCESSABLE_ENTITY,
    );
  }
}

/**
 * Thrown when the byte stream ended abnormally (client disconnect,
 * broken multipart body). Maps to HTTP 400 Bad Request.
 */
export class StreamTruncatedException extends HttpException {
  constructor(cause: Error) {
    super(
      {
        statusCode: HttpStatus.BAD_REQUEST,
        error: 'Bad Request',
        code: 'UPLOAD_TRUNCATED',
        message: 'Upload stream ended before the file was fully received',
      },
      HttpStatus.BAD_REQUEST,
      { cause },
    );
  }
}

/**
 * Thrown when the audio part carried zero bytes.
 * Maps to HTTP 400 Bad Request.
 */
export class EmptyUploadException extends HttpException {
  constructor() {
    super(
      {
        statusCode: HttpStatus.BAD_REQUEST,
        error: 'Bad Request',
        code: 'EMPTY_UPLOAD',
        message: 'Uploaded file is empty',
      },
      HttpStatus.BAD_REQUEST,
    );
  }
}

/**
 * Thrown when no file is attached under the expected multipart field.
 * Maps to HTTP 400 Bad Request.
 */
export class MissingFileException extends HttpException {
  constructor(fieldName: string) {
    super(
      {
        statusCode: HttpStatus.BAD_REQUEST,
        error: 'Bad Request',
        code: 'MISSING_FILE',
        message: `An audio file must be attached to the "${fieldName}" multipart field`,
      },
      HttpStatus.BAD_REQUEST,
    );
  }
}

/**
 * Thrown when the request body is not parseable multipart/form-data.
 * Maps to HTTP 400 Bad Request.
 */
export class MalformedMultipartException extends HttpException {
  constructor(cause: Error) {
    super(
      {
        statusCode: HttpStatus.BAD_REQUEST,
        error: 'Bad Request',
        code: 'MALFORMED_MULTIPART',
        message: 'Request body must be multipart/form-data',
      },
      HttpStatus.BAD_REQUEST,
      { cause },
    );
  }
}
