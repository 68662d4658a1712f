import { TranscriptResponseDto } from './transcript-response.dto';

export class PaginatedTranscriptsDto {
  data: TranscriptResponseDto[];
  page: number;
  limit: number;
  total: number;
  totalPages: number;

  constructor(data: TranscriptResponseDto[], page: number, limit: number, total: number) {
    this.data = data;
    this.page = page;
    this.limit = limit;
    this.total = total;
    this.totalPages = Math.ceil(total / limit);
  }
}
