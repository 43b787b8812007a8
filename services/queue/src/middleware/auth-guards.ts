import { Permission, requirePermission } from '@cleanq/auth-utils';

// ─── Cleaning Queue Authorization Guards ────────────────────────────
// Each guard maps to a route action and enforces the role matrix.

export const guards = {
  readQueue: requirePermission(Permission.QUEUE_CLEANING_READ),
  reorderQueue: requirePermission(Permission.QUEUE_CLEANING_REORDER),
  manageQueue: requirePermission(Permission.QUEUE_CLEANING_MANAGE),
} as const;
