export {
  ListTranscriptsQueryDto,
  DEFAULT_PAGE_LIMIT,
  MAX_PAGE_LIMIT,
} from './list-transcripts-query.dto';
export { TranscriptResponseDto } from './transcript-response.dto';
export { PaginatedTranscriptsDto } from './paginated-transcripts.dto';
