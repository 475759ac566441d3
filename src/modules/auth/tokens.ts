/** JWT helpers: access tokens are minted by the identity service; the API only verifies them. */
import { randomUUID } from "node:crypto";

import jwt, { type SignOptions } from "jsonwebtoken";
import { z } from "zod";

import { env } from "../../config/env.js";
import { ROLES, type Role } from "../../domain/enums.js";

const AccessClaimsSchema = z.object({
  sub: z.string().min(1), // user id
  role: z.enum(ROLES),
  sid: z.string().min(1), // login session; pending quotes are keyed by it
  type: z.literal("access"),
  jti: z.string().optional(),
});

export type AccessClaims = z.infer<typeof AccessClaimsSchema>;

export function newJti(): string {
  return randomUUID();
}

/** Used by scripts and specs; production tokens come from the identity service. */
export function signAccessToken(input: { sub: string; role: Role; sid: string; jti?: string }): string {
  const payload = { sub: input.sub, role: input.role, sid: input.sid, type: "access" };

  const opts: SignOptions = {
    algorithm: "HS256",
    expiresIn: env.JWT_ACCESS_TTL, // seconds
    issuer: env.JWT_ISS,
    audience: env.JWT_AUD,
    jwtid: input.jti ?? newJti(),
  };

  return jwt.sign(payload, env.JWT_SECRET, opts);
}

export function verifyAccess(token: string): AccessClaims {
  const decoded = jwt.verify(token, env.JWT_SECRET, {
    algorithms: ["HS256"],
    issuer: env.JWT_ISS,
    audience: env.JWT_AUD,
  });
  const parsed = AccessClaimsSchema.safeParse(decoded);
  if (!parsed.success) {
    throw Object.assign(new Error("Invalid token claims"), { code: "INVALID_TOKEN" });
  }
  return parsed.data;
}
