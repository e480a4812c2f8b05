import { AuthService } from '../../src/access/application/auth.service';
import {
  EmailTakenError,
  InvalidCredentialsError,
  InvalidSessionError,
  RegistrationClosedError,
  UserNotFoundError,
  UsernameTakenError,
} from '../../src/access/application/errors';
import { PasswordHasher } from '../../src/access/application/password-hasher';
import { hashSessionToken } from '../../src/access/application/session-token';
import {
  InMemorySessionRepository,
  InMemoryUserRepository,
} from '../support/in-memory-access-repositories';
import { makeServerConfig } from '../support/server-config';

const ALICE = {
  email: 'alice@example.com',
  username: 'alice',
  password: 'test-password',
};

const setup = (env: Record<string, string> = {}) => {
  const users = new InMemoryUserRepository();
  const sessions = new InMemorySessionRepository(users);
  const service = new AuthService(
    users,
    sessions,
    new PasswordHasher(),
    makeServerConfig(env)
  );
  return { users, sessions, service };
};

describe('AuthService', () => {
  it('registers a user and returns a usable session', async () => {
    const { service, users } = setup();

    const { session } = await service.register(ALICE);
    const user = await service.validateSession(session);

    expect(session).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(user.username).toBe('alice');
    expect(user.id).toBe((await users.findByUsername('alice'))?.id);
  });

  it('stores only the hash of the session token', async () => {
    const { service, sessions } = setup();

    const { session } = await service.register(ALICE);

    await expect(sessions.findByTokenHash(session)).resolves.toBeNull();
    await expect(
      sessions.findByTokenHash(hashSessionToken(session))
    ).resolves.toMatchObject({ username: 'alice' });
  });

  it('never stores the plain password', async () => {
    const { service, users } = setup();

    await service.register(ALICE);
    const user = await users.findByUsername('alice');

    expect(user?.passwordHash.startsWith('scrypt$')).toBe(true);
    expect(user?.passwordHash).not.toContain('test-password');
  });

  it('rejects a taken username', async () => {
    const { service } = setup();
    await service.register(ALICE);

    await expect(
      service.register({ ...ALICE, email: 'other@example.com' })
    ).rejects.toBeInstanceOf(UsernameTakenError);
  });

  it('rejects a taken email regardless of case', async () => {
    const { service } = setup();
    await service.register(ALICE);

    await expect(
      service.register({
        ...ALICE,
        username: 'alice2',
        email: ' Alice@Example.com ',
      })
    ).rejects.toBeInstanceOf(EmailTakenError);
  });

  it('refuses registration when it is closed', async () => {
    const { service } = setup({ OPEN_REGISTRATION: 'false' });

    await expect(service.register(ALICE)).rejects.toBeInstanceOf(
      RegistrationClosedError
    );
  });

  it('logs in with the right password and issues a fresh session', async () => {
    const { service } = setup();
    const registered = await service.register(ALICE);

    const loggedIn = await service.login({
      username: 'alice',
      password: 'test-password',
    });

    expect(loggedIn.session).not.toBe(registered.session);
    await expect(service.validateSession(loggedIn.session)).resolves.toEqual(
      expect.objectContaining({ username: 'alice' })
    );
  });

  it('rejects a wrong password and an unknown user alike', async () => {
    const { service } = setup();
    await service.register(ALICE);

    await expect(
      service.login({ username: 'alice', password: 'wrong-password' })
    ).rejects.toBeInstanceOf(InvalidCredentialsError);
    await expect(
      service.login({ username: 'mallory', password: 'test-password' })
    ).rejects.toBeInstanceOf(InvalidCredentialsError);
  });

  it('revokes a session on logout', async () => {
    const { service } = setup();
    const { session } = await service.register(ALICE);

    await expect(service.logout(session)).resolves.toBe(true);
    await expect(service.logout(session)).resolves.toBe(false);
    await expect(service.validateSession(session)).rejects.toBeInstanceOf(
      InvalidSessionError
    );
  });

  it('drops expired sessions when they are presented', async () => {
    const { service, sessions } = setup();
    const { session } = await service.register(ALICE);
    sessions.expireAll();

    await expect(service.validateSession(session)).rejects.toBeInstanceOf(
      InvalidSessionError
    );
    expect(sessions.size).toBe(0);
  });

  it('looks users up by name', async () => {
    const { service } = setup();
    await service.register(ALICE);

    await expect(service.getUser('alice')).resolves.toEqual({
      username: 'alice',
    });
    await expect(service.getUser('bob')).rejects.toBeInstanceOf(
      UserNotFoundError
    );
  });
});
