import { HttpJsonClient, type HttpJsonClientOptions } from './httpClient';
import {
  logoutResponseSchema,
  sessionResponseSchema,
  userResponseSchema,
  type LoginRequestV1,
  type LogoutResponseV1,
  type RegisterRequestV1,
  type SessionResponseV1,
  type UserResponseV1,
} from './protocol';

/** Produces the session token the sync transport authenticates with. */
export class HttpAuthClient {
  private readonly client: HttpJsonClient;

  constructor(options: HttpJsonClientOptions) {
    this.client = new HttpJsonClient(options);
  }

  async register(request: RegisterRequestV1): Promise<SessionResponseV1> {
    return this.client.request(
      { method: 'POST', path: '/register', body: request },
      sessionResponseSchema
    );
  }

  async login(request: LoginRequestV1): Promise<SessionResponseV1> {
    return this.client.request(
      { method: 'POST', path: '/login', body: request },
      sessionResponseSchema
    );
  }

  async logout(sessionToken: string): Promise<LogoutResponseV1> {
    return this.client.request(
      { method: 'POST', path: '/logout', sessionToken },
      logoutResponseSchema
    );
  }

  async getUser(username: string): Promise<UserResponseV1> {
    return this.client.request(
      { method: 'GET', path: `/user/${encodeURIComponent(username)}` },
      userResponseSchema
    );
  }
}
