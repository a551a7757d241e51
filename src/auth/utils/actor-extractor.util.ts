import { UnauthorizedException } from '@nestjs/common';
import { Actor } from '../domain/actor';
import { isPermission } from '../../roles/permission.enum';
import { AuthenticatedRequest } from '../strategies/types/jwt-payload.type';

/**
 * Extract actor from request
 *
 * Permission names the service does not know are dropped rather than
 * passed through to the domain layer.
 *
 * @param req - Express request with user from JWT
 * @returns Actor object with role, department and permissions
 */
export function extractActorFromRequest(
  req: Pick<AuthenticatedRequest, 'user'>,
): Actor {
  const userId = req.user?.id;
  const roleId = req.user?.role?.id;

  if (!userId || !roleId) {
    throw new UnauthorizedException('User ID or role ID not found in request');
  }

  return {
    id: Number(userId),
    role: roleId,
    departmentId: req.user?.departmentId ?? null,
    isActive: req.user?.isActive ?? false,
    permissions: (req.user?.permissions ?? []).filter(isPermission),
  };
}
