import type { AuthErrorCode } from "../services/authErrors.js";
import type { AuthContext } from "./auth.js";

declare global {
  namespace Express {
    interface Request {
      authContext?: AuthContext;
      authFailure?: AuthErrorCode;
    }
  }
}

export {};
