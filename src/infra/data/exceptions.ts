/**
 * Exceptions thrown by data sources. Repositories wrap them in a
 * `ServerFailure`, which keeps the original as `cause` so the HTTP layer
 * can pick a status code.
 */
export class DataSourceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidCredentialsError extends DataSourceError {
  constructor(message = 'Invalid email or password') {
    super(message);
  }
}

export class EmailTakenError extends DataSourceError {
  constructor(message = 'User with this email already exists') {
    super(message);
  }
}

export class UserNotFoundError extends DataSourceError {
  constructor(message = 'User not found') {
    super(message);
  }
}
