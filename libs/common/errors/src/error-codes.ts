export enum ErrorCode {
  // Auth errors
  InvalidCredentials = 'InvalidCredentials',
  SessionInvalid = 'SessionInvalid',
  TokenInvalid = 'TokenInvalid',

  // Admission errors
  RateLimitExceeded = 'RateLimitExceeded',

  // Infrastructure errors
  SigningKeyUnavailable = 'SigningKeyUnavailable',
  PersistenceUnavailable = 'PersistenceUnavailable',

  // General errors
  ValidationError = 'ValidationError',
  InternalError = 'InternalError',
}
