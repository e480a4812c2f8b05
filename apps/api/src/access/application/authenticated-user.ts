export type AuthenticatedUser = Readonly<{
  id: string;
  username: string;
}>;
