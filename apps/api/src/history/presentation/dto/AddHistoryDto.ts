import { MAX_BLOB_DATA_LENGTH } from '@shellsync/sync-engine';
import { IsISO8601, IsString, Matches, MaxLength, MinLength } from 'class-validator';

export const HISTORY_ID_REGEX =
  /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

export class AddHistoryDto {
  @IsString()
  @Matches(HISTORY_ID_REGEX, { message: 'id must be a lowercase UUIDv4' })
  id!: string;

  @IsISO8601({ strict: true })
  timestamp!: string;

  @IsString()
  @MinLength(1)
  @MaxLength(MAX_BLOB_DATA_LENGTH)
  data!: string;

  @IsString()
  @MaxLength(255)
  hostname!: string;
}
