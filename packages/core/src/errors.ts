export type AuthErrorKind =
  | 'NotFound'
  | 'AlreadyExists'
  | 'InsufficientRole'
  | 'WrongChatType'
  | 'GroupNotAuthorized'
  | 'NotWhitelisted'
  | 'BadRequest'
  | 'StorageUnavailable';

/**
 * Error raised by the authorization layers. Only StorageUnavailable is retryable;
 * every other kind is terminal for the current request.
 */
export class AuthError extends Error {
  readonly kind: AuthErrorKind;
  readonly retryable: boolean;

  constructor(kind: AuthErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AuthError';
    this.kind = kind;
    this.retryable = kind === 'StorageUnavailable';
  }
}

export function isAuthError(err: unknown, kind?: AuthErrorKind): err is AuthError {
  return err instanceof AuthError && (kind === undefined || err.kind === kind);
}
