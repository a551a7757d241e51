import { ForbiddenException } from '@nestjs/common';
import { PermissionEnum } from '../../roles/permission.enum';
import { RoleEnum } from '../../roles/roles.enum';

/**
 * Caller identity as supplied by the identity provider.
 *
 * The workflow engine treats this as already-validated input and performs
 * no credential checks of its own.
 */
export interface Actor {
  id: number;
  role: RoleEnum;
  departmentId: number | null;
  isActive: boolean;
  permissions: PermissionEnum[];
}

/**
 * Super admins implicitly hold every permission.
 */
export function actorHasPermission(
  actor: Actor,
  ...permissions: PermissionEnum[]
): boolean {
  if (actor.role === RoleEnum.superAdmin) {
    return true;
  }
  return permissions.some((permission) =>
    actor.permissions.includes(permission),
  );
}

/**
 * @throws ForbiddenException when the actor is inactive or holds none of
 * the given permissions
 */
export function requirePermission(
  actor: Actor,
  action: string,
  ...permissions: PermissionEnum[]
): void {
  requireActiveActor(actor);
  if (!actorHasPermission(actor, ...permissions)) {
    throw new ForbiddenException(
      `Missing permission to ${action}: requires ${permissions.join(' or ')}`,
    );
  }
}

export function requireActiveActor(actor: Actor): void {
  if (!actor.isActive) {
    throw new ForbiddenException('Inactive accounts cannot change requests');
  }
}
