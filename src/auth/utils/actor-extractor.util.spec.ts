import { UnauthorizedException } from '@nestjs/common';
import { PermissionEnum } from '../../roles/permission.enum';
import { RoleEnum } from '../../roles/roles.enum';
import { AuthenticatedRequest } from '../strategies/types/jwt-payload.type';
import { extractActorFromRequest } from './actor-extractor.util';

function requestWith(
  user: AuthenticatedRequest['user'],
): Pick<AuthenticatedRequest, 'user'> {
  return { user };
}

describe('extractActorFromRequest', () => {
  it('should map the token payload to an actor', () => {
    const actor = extractActorFromRequest(
      requestWith({
        id: 7,
        role: { id: RoleEnum.expert },
        departmentId: 3,
        isActive: true,
        permissions: [PermissionEnum.uploadDocuments],
      }),
    );

    expect(actor).toEqual({
      id: 7,
      role: RoleEnum.expert,
      departmentId: 3,
      isActive: true,
      permissions: [PermissionEnum.uploadDocuments],
    });
  });

  it('should drop permission names it does not know', () => {
    const actor = extractActorFromRequest(
      requestWith({
        id: 7,
        role: { id: RoleEnum.user },
        departmentId: null,
        isActive: true,
        permissions: ['launch_rockets', PermissionEnum.addComments],
      }),
    );

    expect(actor.permissions).toEqual([PermissionEnum.addComments]);
    expect(actor.departmentId).toBeNull();
  });

  it('should reject a request without an authenticated user', () => {
    expect(() => extractActorFromRequest(requestWith(undefined))).toThrow(
      UnauthorizedException,
    );
  });
});
