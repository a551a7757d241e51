import { Injectable, CanActivate, ExecutionContext } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { RoleEnum } from './roles.enum';
import { ROLES_KEY } from './roles.decorator';
import { AuthenticatedRequest } from '../auth/strategies/types/jwt-payload.type';

@Injectable()
export class RolesGuard implements CanActivate {
  constructor(private reflector: Reflector) {}

  canActivate(context: ExecutionContext): boolean {
    const roles = this.reflector.getAllAndOverride<RoleEnum[] | undefined>(
      ROLES_KEY,
      [context.getClass(), context.getHandler()],
    );
    if (!roles || !roles.length) {
      return true;
    }
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();

    const userRoleId = request.user?.role?.id;
    if (!userRoleId) {
      return false;
    }

    return roles.includes(userRoleId);
  }
}
