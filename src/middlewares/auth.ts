import type { Request, Response, NextFunction } from "express";

import { errorMessage } from "../config/logger.js";
import type { Role } from "../domain/enums.js";
import { ForbiddenError } from "../domain/errors.js";
import { verifyAccess } from "../modules/auth/tokens.js";

/** Authenticated caller as seen by the core: who, in which role, in which login session. */
export type AuthContext = { userId: string; role: Role; sessionId: string };
export type Actor = AuthContext;

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      auth?: AuthContext;
    }
  }
}

export function requireAuth(req: Request, res: Response, next: NextFunction) {
  const hdr = req.get("authorization");
  if (!hdr || !hdr.startsWith("Bearer ")) {
    return res
      .status(401)
      .json({ error: { code: "UNAUTHORIZED", message: "Missing Bearer token" } });
  }
  const token = hdr.slice("Bearer ".length).trim();

  try {
    // verifyAccess enforces iss/aud/alg/exp and type === 'access'
    const claims = verifyAccess(token);
    req.auth = { userId: claims.sub, role: claims.role, sessionId: claims.sid };
  } catch (err) {
    return res
      .status(401)
      .json({ error: { code: "UNAUTHORIZED", message: errorMessage(err) || "Invalid token" } });
  }
  next();
}

export function requireRole(...roles: Role[]) {
  return (req: Request, res: Response, next: NextFunction) => {
    const auth = getActor(req);
    if (!roles.includes(auth.role)) {
      return res.status(403).json({ error: { code: "FORBIDDEN", message: "Insufficient role" } });
    }
    next();
  };
}

export function getActor(req: Request): Actor {
  const ctx = req.auth;
  if (!ctx) throw new Error("Auth context missing (requireAuth not applied)");
  return ctx;
}

/** Role re-check inside the core, for callers that bypass the router gate. */
export function assertRole(actor: Actor, role: Role, message = "Insufficient role") {
  if (actor.role !== role) throw new ForbiddenError(message);
}
