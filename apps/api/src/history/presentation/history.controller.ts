import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Inject,
  ParseArrayPipe,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import type { AuthenticatedUser } from '../../access/application/authenticated-user';
import { AuthUser } from '../../access/auth-user.decorator';
import { SessionTokenGuard } from '../../access/presentation/guards/session-token.guard';
import {
  HistoryService,
  UploadTooLargeError,
} from '../application/history.service';
import type { HistoryBlob } from '../domain/HistoryBlob';
import { HistoryBlobId } from '../domain/value-objects/HistoryBlobId';
import { HistoryOwnerId } from '../domain/value-objects/HistoryOwnerId';
import { AddHistoryDto } from './dto/AddHistoryDto';
import { SyncHistoryQueryDto } from './dto/SyncHistoryQueryDto';

type SyncHistoryBlobResponse = {
  id: string;
  timestamp: string;
  data: string;
  hostname: string;
};

const toResponse = (blob: HistoryBlob): SyncHistoryBlobResponse => ({
  id: blob.id.unwrap(),
  timestamp: blob.timestamp.toISOString(),
  data: blob.data,
  hostname: blob.hostname,
});

const requireOwner = (user: AuthenticatedUser | undefined): HistoryOwnerId => {
  if (!user) {
    throw new BadRequestException('Authenticated user missing');
  }
  return HistoryOwnerId.from(user.id);
};

@Controller()
@UseGuards(SessionTokenGuard)
export class HistoryController {
  constructor(
    @Inject(HistoryService) private readonly historyService: HistoryService
  ) {}

  @Post('history')
  async addHistory(
    @Body(new ParseArrayPipe({ items: AddHistoryDto, whitelist: true }))
    dtos: AddHistoryDto[],
    @AuthUser() user: AuthenticatedUser | undefined
  ): Promise<{ stored: number }> {
    const ownerId = requireOwner(user);
    try {
      return await this.historyService.addHistory(
        ownerId,
        dtos.map((dto) => ({
          id: HistoryBlobId.from(dto.id),
          timestamp: new Date(dto.timestamp),
          hostname: dto.hostname,
          data: dto.data,
        }))
      );
    } catch (error) {
      if (error instanceof UploadTooLargeError) {
        throw new BadRequestException(error.message);
      }
      throw error;
    }
  }

  @Get('sync/count')
  async count(
    @AuthUser() user: AuthenticatedUser | undefined
  ): Promise<{ count: number; server_time: string }> {
    const count = await this.historyService.count(requireOwner(user));
    return { count, server_time: new Date().toISOString() };
  }

  @Get('sync/history')
  async syncHistory(
    @Query() dto: SyncHistoryQueryDto,
    @AuthUser() user: AuthenticatedUser | undefined
  ): Promise<{ history: SyncHistoryBlobResponse[] }> {
    const blobs = await this.historyService.syncHistory(requireOwner(user), {
      syncTs: new Date(dto.sync_ts),
      historyTs: new Date(dto.history_ts),
      historyId: dto.history_id ? HistoryBlobId.from(dto.history_id) : undefined,
      host: dto.host,
    });
    return { history: blobs.map(toResponse) };
  }
}
