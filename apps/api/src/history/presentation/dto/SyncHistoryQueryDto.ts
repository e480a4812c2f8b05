import { IsISO8601, IsOptional, IsString, Matches, MaxLength } from 'class-validator';
import { HISTORY_ID_REGEX } from './AddHistoryDto';

export class SyncHistoryQueryDto {
  @IsISO8601({ strict: true })
  sync_ts!: string;

  @IsISO8601({ strict: true })
  history_ts!: string;

  @IsOptional()
  @IsString()
  @Matches(HISTORY_ID_REGEX, {
    message: 'history_id must be a lowercase UUIDv4',
  })
  history_id?: string;

  @IsOptional()
  @IsString()
  @MaxLength(255)
  host?: string;
}
