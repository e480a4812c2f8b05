import type { AuthenticatedUser } from '../../application/authenticated-user';

declare module 'express-serve-static-core' {
  interface Request {
    authUser?: AuthenticatedUser;
    sessionToken?: string;
  }
}
