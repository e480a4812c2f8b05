import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../../platform/infrastructure/database/database.service';
import type { HistoryDatabase } from './database.types';

@Injectable()
export class HistoryDatabaseService extends DatabaseService<HistoryDatabase> {}
