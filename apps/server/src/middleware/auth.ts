import type { NextFunction, Request, Response } from "express";
import { env } from "../config/env.js";
import { AuthError, describeAuthError, StorageUnavailableError } from "../services/authErrors.js";
import { authService, type AuthService } from "../services/authService.js";

interface CookieHeaderSource {
  header(name: string): string | undefined;
}

export function cookieTokenFromRequest(
  req: CookieHeaderSource,
  cookieName: string = env.SESSION_COOKIE_NAME
): string | null {
  const rawCookie = req.header("cookie");
  if (!rawCookie) return null;
  const segments = rawCookie.split(";").map((part) => part.trim());
  for (const segment of segments) {
    if (!segment.startsWith(`${cookieName}=`)) continue;
    const value = segment.slice(cookieName.length + 1);
    if (!value) return null;
    try {
      return decodeURIComponent(value);
    } catch {
      return null;
    }
  }
  return null;
}

export function sessionCookie(token: string, maxAgeSeconds: number): string {
  const secure = env.NODE_ENV === "production" ? "; Secure" : "";
  return `${env.SESSION_COOKIE_NAME}=${encodeURIComponent(token)}; Path=/; HttpOnly; SameSite=Lax${secure}; Max-Age=${maxAgeSeconds}`;
}

export function clearedSessionCookie(): string {
  const secure = env.NODE_ENV === "production" ? "; Secure" : "";
  return `${env.SESSION_COOKIE_NAME}=; Path=/; HttpOnly; SameSite=Lax${secure}; Max-Age=0`;
}

/**
 * Resolves the session cookie once per request into `req.authContext`,
 * or records why it could not in `req.authFailure`.
 */
export function createAttachAuthContext(service: Pick<AuthService, "authenticate">) {
  return async (req: Request, _res: Response, next: NextFunction) => {
    const token = cookieTokenFromRequest(req);
    req.authContext = undefined;
    req.authFailure = undefined;
    if (!token) {
      req.authFailure = "no_session";
      return next();
    }
    try {
      req.authContext = await service.authenticate(token);
      return next();
    } catch (error) {
      if (error instanceof AuthError) {
        req.authFailure = error.code;
        return next();
      }
      return next(error);
    }
  };
}

export const attachAuthContext = createAttachAuthContext(authService);

export function requireAuth(req: Request, res: Response, next: NextFunction) {
  if (!req.authContext) {
    const failure = describeAuthError(req.authFailure ?? "no_session");
    return res.status(failure.status).json({ error: failure.error, message: failure.message });
  }
  next();
}

export function handleServiceError(error: unknown, res: Response, fallback: string) {
  if (error instanceof AuthError) {
    const failure = describeAuthError(error.code);
    return res.status(failure.status).json({ error: failure.error, message: failure.message });
  }
  if (error instanceof StorageUnavailableError) {
    return res.status(503).json({ error: "storage_unavailable" });
  }
  return res.status(500).json({
    error: fallback,
    detail: error instanceof Error ? error.message : "unknown_error"
  });
}
