export type AuthErrorCode =
  | "invalid_credentials"
  | "inactive_account"
  | "no_session"
  | "expired_session"
  | "identity_not_found"
  | "duplicate_username"
  | "invalid_or_expired_reset_token"
  | "weak_password";

export class AuthError extends Error {
  readonly code: AuthErrorCode;

  constructor(code: AuthErrorCode) {
    super(code);
    this.name = "AuthError";
    this.code = code;
  }
}

/** Backend failure; distinct from a row simply not being there. */
export class StorageUnavailableError extends Error {
  constructor(operation: string, options?: { cause?: unknown }) {
    super(`storage_unavailable:${operation}`, options);
    this.name = "StorageUnavailableError";
  }
}

export interface AuthErrorResponse {
  status: number;
  error: string;
  message: string;
}

const UNAUTHENTICATED: AuthErrorResponse = {
  status: 401,
  error: "unauthenticated",
  message: "Authentication required"
};

export function describeAuthError(code: AuthErrorCode): AuthErrorResponse {
  switch (code) {
    case "invalid_credentials":
      return { status: 401, error: code, message: "Invalid username or password" };
    case "inactive_account":
      return { status: 403, error: code, message: "Account is inactive" };
    case "no_session":
    case "expired_session":
    case "identity_not_found":
      return UNAUTHENTICATED;
    case "duplicate_username":
      return { status: 400, error: code, message: "Username already exists" };
    case "invalid_or_expired_reset_token":
      return { status: 400, error: code, message: "Invalid or expired token" };
    case "weak_password":
      return { status: 400, error: code, message: "Password must be at least 8 characters long" };
    default: {
      const unreachable: never = code;
      throw new Error(`unknown_auth_error:${String(unreachable)}`);
    }
  }
}
