import {
  CanActivate,
  ExecutionContext,
  Inject,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import type { Request } from 'express';
import { AuthService } from '../../application/auth.service';
import { InvalidSessionError } from '../../application/errors';
import { SessionCache } from '../../application/session-cache';

const TOKEN_SCHEME = /^Token\s+(\S+)$/;

export const parseSessionHeader = (
  header: string | undefined
): string | null => {
  if (!header) return null;
  const match = TOKEN_SCHEME.exec(header.trim());
  return match?.[1] ?? null;
};

/** Accepts `Authorization: Token <session>` and attaches the user to the request. */
@Injectable()
export class SessionTokenGuard implements CanActivate {
  constructor(
    @Inject(AuthService) private readonly authService: AuthService,
    @Inject(SessionCache) private readonly sessionCache: SessionCache
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<Request>();
    const sessionToken = parseSessionHeader(request.headers.authorization);
    if (!sessionToken) {
      throw new UnauthorizedException('Session token is required');
    }

    let authUser = this.sessionCache.read(sessionToken);
    if (!authUser) {
      try {
        authUser = await this.authService.validateSession(sessionToken);
      } catch (error) {
        if (error instanceof InvalidSessionError) {
          throw new UnauthorizedException('Invalid or expired session');
        }
        throw error;
      }
      this.sessionCache.write(sessionToken, authUser);
    }

    request.authUser = authUser;
    request.sessionToken = sessionToken;
    return true;
  }
}
