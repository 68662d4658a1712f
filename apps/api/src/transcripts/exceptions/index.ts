export {
  FileTooLargeException,
  UnsupportedFormatException,
  StreamTruncatedException,
  EmptyUploadException,
  MissingFileException,
  MalformedMultipartException,
} from './upload.exceptions';
export {
  EngineFailureException,
  EngineTimeoutException,
  TranscriptTooLongException,
  PersistenceFailedException,
  TranscriptNotFoundException,
} from './transcription.exceptions';
