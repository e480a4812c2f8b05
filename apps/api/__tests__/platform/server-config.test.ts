import {
  ServerConfig,
  validateServerEnv,
} from '../../src/platform/config/server-config';
import { TEST_DATABASE_URL } from '../support/server-config';

describe('server configuration', () => {
  it('fills in defaults', () => {
    const config = new ServerConfig(
      validateServerEnv({ DATABASE_URL: TEST_DATABASE_URL })
    );

    expect(config).toEqual({
      databaseUrl: TEST_DATABASE_URL,
      port: 8888,
      openRegistration: true,
      sessionTtlMs: 30 * 24 * 60 * 60 * 1000,
      sessionCacheTtlMs: 30_000,
    });
  });

  it('coerces values read from the environment', () => {
    const config = new ServerConfig(
      validateServerEnv({
        DATABASE_URL: TEST_DATABASE_URL,
        PORT: '9000',
        OPEN_REGISTRATION: '0',
        SESSION_TTL_DAYS: '1',
      })
    );

    expect(config.port).toBe(9000);
    expect(config.openRegistration).toBe(false);
    expect(config.sessionTtlMs).toBe(86_400_000);
  });

  it('rejects a missing database url and bad values', () => {
    expect(() => validateServerEnv({})).toThrow(
      /^Invalid server environment: DATABASE_URL: /
    );
    expect(() =>
      validateServerEnv({
        DATABASE_URL: TEST_DATABASE_URL,
        PORT: '70000',
      })
    ).toThrow(/PORT/);
    expect(() =>
      validateServerEnv({
        DATABASE_URL: TEST_DATABASE_URL,
        OPEN_REGISTRATION: 'maybe',
      })
    ).toThrow(/OPEN_REGISTRATION/);
  });
});
