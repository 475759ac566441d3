// src/modules/users/service.ts
import { ForbiddenError, NotFoundError } from "../../domain/errors.js";
import { assertRole, type Actor } from "../../middlewares/auth.js";
import type { UserRecord, UserRepository } from "../../store/types.js";

/**
 * Load the calling host and make sure the account may run host operations:
 * the token role alone does not say whether an admin has since blocked it.
 */
export async function requireActiveHost(users: UserRepository, actor: Actor): Promise<UserRecord> {
  assertRole(actor, "host", "Host access required");
  const host = await users.findById(actor.userId);
  if (!host) throw new NotFoundError("Host not found", "USER_NOT_FOUND");

  if (!host.isActive) {
    throw new ForbiddenError(
      "Your account has been temporarily blocked by the Administrator. Please contact support.",
      "ACCOUNT_BLOCKED"
    );
  }
  if (!host.isApprovedHost) {
    throw new ForbiddenError(
      "You must be an approved host to access this page. Please wait for Admin approval.",
      "HOST_NOT_APPROVED"
    );
  }
  return host;
}
