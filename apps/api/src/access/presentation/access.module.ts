import { Module } from '@nestjs/common';
import { AuthService } from '../application/auth.service';
import { PasswordHasher } from '../application/password-hasher';
import { SessionRepository } from '../application/ports/session-repository';
import { UserRepository } from '../application/ports/user-repository';
import { SessionCache } from '../application/session-cache';
import { AccessDatabaseModule } from '../infrastructure/database.module';
import { KyselySessionRepository } from '../infrastructure/kysely-session.repository';
import { KyselyUserRepository } from '../infrastructure/kysely-user.repository';
import { AuthController } from './controllers/auth.controller';
import { SessionTokenGuard } from './guards/session-token.guard';

@Module({
  imports: [AccessDatabaseModule],
  controllers: [AuthController],
  providers: [
    AuthService,
    PasswordHasher,
    SessionCache,
    SessionTokenGuard,
    {
      provide: UserRepository,
      useClass: KyselyUserRepository,
    },
    {
      provide: SessionRepository,
      useClass: KyselySessionRepository,
    },
  ],
  exports: [AuthService, SessionCache, SessionTokenGuard],
})
export class AccessModule {}
