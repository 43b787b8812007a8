// ─── Roles ───────────────────────────────────────────────────────────
export type UserRole = 'admin' | 'manager' | 'staff';

export const USER_ROLES: readonly UserRole[] = ['admin', 'manager', 'staff'];

// ─── Permission Registry ─────────────────────────────────────────────
// Format: service:resource:action
export const Permission = {
  QUEUE_CLEANING_READ: 'queue:cleaning:read',
  QUEUE_CLEANING_REORDER: 'queue:cleaning:reorder',
  QUEUE_CLEANING_MANAGE: 'queue:cleaning:manage',
} as const;

export type PermissionString = (typeof Permission)[keyof typeof Permission];

// admin is not listed: it holds every permission.
export const ROLE_PERMISSIONS: Record<Exclude<UserRole, 'admin'>, ReadonlySet<PermissionString>> = {
  manager: new Set([
    Permission.QUEUE_CLEANING_READ,
    Permission.QUEUE_CLEANING_REORDER,
    Permission.QUEUE_CLEANING_MANAGE,
  ]),
  staff: new Set([Permission.QUEUE_CLEANING_READ]),
};

function isUserRole(role: string): role is UserRole {
  return (USER_ROLES as readonly string[]).includes(role);
}

export function hasPermission(role: string, permission: PermissionString): boolean {
  if (!isUserRole(role)) return false;
  if (role === 'admin') return true;
  return ROLE_PERMISSIONS[role].has(permission);
}
