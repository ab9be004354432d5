/**
 * Audit stamping shared by every persisted record except projects.
 * Store implementations spread these into inserts and updates so the
 * created/modified columns are never set by hand.
 */

export interface AuditStamp {
  createdAt: Date;
  createdBy: string;
  lastModifiedAt: Date;
  lastModifiedBy: string;
  isDeleted: boolean;
}

export type ModifiedStamp = Pick<AuditStamp, "lastModifiedAt" | "lastModifiedBy">;

export function stampCreate(actor: string, now: Date = new Date()): AuditStamp {
  return {
    createdAt: now,
    createdBy: actor,
    lastModifiedAt: now,
    lastModifiedBy: actor,
    isDeleted: false,
  };
}

export function stampUpdate(actor: string, now: Date = new Date()): ModifiedStamp {
  return { lastModifiedAt: now, lastModifiedBy: actor };
}
