export class UsernameTakenError extends Error {
  constructor() {
    super('username already taken');
    this.name = 'UsernameTakenError';
  }
}

export class EmailTakenError extends Error {
  constructor() {
    super('email already registered');
    this.name = 'EmailTakenError';
  }
}

export class InvalidCredentialsError extends Error {
  constructor() {
    super('invalid username or password');
    this.name = 'InvalidCredentialsError';
  }
}

export class RegistrationClosedError extends Error {
  constructor() {
    super('registration is closed');
    this.name = 'RegistrationClosedError';
  }
}

export class InvalidSessionError extends Error {
  constructor() {
    super('invalid or expired session');
    this.name = 'InvalidSessionError';
  }
}

export class UserNotFoundError extends Error {
  constructor(readonly username: string) {
    super('user not found');
    this.name = 'UserNotFoundError';
  }
}
