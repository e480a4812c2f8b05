import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

export const serverEnvSchema = z.object({
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8888),
  OPEN_REGISTRATION: booleanFlag.default('true'),
  SESSION_TTL_DAYS: z.coerce.number().int().positive().default(30),
  SESSION_CACHE_TTL_MS: z.coerce.number().int().nonnegative().default(30_000),
});

export type ServerEnv = z.infer<typeof serverEnvSchema>;

export const validateServerEnv = (env: Record<string, unknown>): ServerEnv => {
  const parsed = serverEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid server environment: ${issues}`);
  }
  return parsed.data;
};

/** Typed view of the validated environment, injected where settings are read. */
export class ServerConfig {
  readonly databaseUrl: string;
  readonly port: number;
  readonly openRegistration: boolean;
  readonly sessionTtlMs: number;
  readonly sessionCacheTtlMs: number;

  constructor(env: ServerEnv) {
    this.databaseUrl = env.DATABASE_URL;
    this.port = env.PORT;
    this.openRegistration = env.OPEN_REGISTRATION;
    this.sessionTtlMs = env.SESSION_TTL_DAYS * 24 * 60 * 60 * 1000;
    this.sessionCacheTtlMs = env.SESSION_CACHE_TTL_MS;
  }
}
