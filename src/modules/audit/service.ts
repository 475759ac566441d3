import { AuditLog, type AuditTargetType } from "./model.js";
import { errorMessage, logger } from "../../config/logger.js";

export type AuditEntry = {
  actorId: string;
  action: string;
  target: { kind: AuditTargetType; id: string };
  diff?: Record<string, unknown>;
};

export interface AuditTrail {
  /** Never throws; admin operations must not fail on audit writes. */
  record(entry: AuditEntry): Promise<void>;
}

export async function writeAudit(entry: AuditEntry) {
  try {
    await AuditLog.create({ ...entry, diff: entry.diff ?? null });
  } catch (err) {
    logger.warn("audit.write_failed", {
      action: entry.action,
      target: `${entry.target.kind}:${entry.target.id}`,
      err: errorMessage(err),
    });
  }
}

export const mongoAuditTrail: AuditTrail = { record: writeAudit };
