export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
  }
}

export class ConfigError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_INVALID', details);
  }
}

export class AuthorizationError extends AppError {
  constructor(
    message: string,
    public readonly reason: 'missing_token' | 'invalid_token' | 'expired'
  ) {
    super(message, 'UNAUTHORIZED', { reason });
  }
}

export class InvalidRequestError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_REQUEST', details);
  }
}
