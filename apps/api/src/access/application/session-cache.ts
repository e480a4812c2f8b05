import { Inject, Injectable } from '@nestjs/common';
import { ServerConfig } from '../../platform/config/server-config';
import type { AuthenticatedUser } from './authenticated-user';

type CacheEntry = {
  value: AuthenticatedUser;
  expiresAt: number;
};

@Injectable()
export class SessionCache {
  private readonly cache = new Map<string, CacheEntry>();
  private readonly ttlMs: number;

  constructor(@Inject(ServerConfig) config: ServerConfig) {
    this.ttlMs = config.sessionCacheTtlMs;
  }

  read(token: string): AuthenticatedUser | null {
    const entry = this.cache.get(token);
    if (!entry) return null;
    if (Date.now() > entry.expiresAt) {
      this.cache.delete(token);
      return null;
    }
    return entry.value;
  }

  write(token: string, value: AuthenticatedUser): void {
    if (this.ttlMs === 0) return;
    const expiresAt = Date.now() + this.ttlMs;
    this.cache.set(token, { value, expiresAt });
  }

  invalidate(token: string): void {
    this.cache.delete(token);
  }
}
