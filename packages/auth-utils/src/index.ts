export {
  generateAccessToken,
  type JwtPayload,
} from './jwt.js';
export {
  authMiddleware,
  requirePermission,
  type AuthRequest,
} from './middleware.js';
export {
  Permission,
  hasPermission,
  type PermissionString,
  type UserRole,
} from './permissions.js';
