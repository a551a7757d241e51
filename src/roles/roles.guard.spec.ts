import { Reflector } from '@nestjs/core';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { AuthenticatedRequest } from '../auth/strategies/types/jwt-payload.type';
import { Roles } from './roles.decorator';
import { RoleEnum } from './roles.enum';
import { RolesGuard } from './roles.guard';

@Roles(RoleEnum.superAdmin, RoleEnum.departmentHead)
class StatisticsController {
  report(): void {}

  @Roles(RoleEnum.viewer)
  summary(): void {}
}

class OpenController {
  list(): void {}
}

function contextFor(
  controller: new () => object,
  handler: () => void,
  user: AuthenticatedRequest['user'],
): ExecutionContextHost {
  const request: Pick<AuthenticatedRequest, 'user'> = { user };
  return new ExecutionContextHost([request, {}, () => undefined], controller, handler);
}

function userWithRole(role: RoleEnum): AuthenticatedRequest['user'] {
  return {
    id: 5,
    role: { id: role },
    departmentId: 1,
    isActive: true,
    permissions: [],
  };
}

describe('RolesGuard', () => {
  const guard = new RolesGuard(new Reflector());

  it('should allow a handler without role metadata', () => {
    const context = contextFor(
      OpenController,
      OpenController.prototype.list,
      userWithRole(RoleEnum.viewer),
    );

    expect(guard.canActivate(context)).toBe(true);
  });

  it('should allow a role listed on the class', () => {
    const context = contextFor(
      StatisticsController,
      StatisticsController.prototype.report,
      userWithRole(RoleEnum.departmentHead),
    );

    expect(guard.canActivate(context)).toBe(true);
  });

  it('should deny a role not listed on the class', () => {
    const context = contextFor(
      StatisticsController,
      StatisticsController.prototype.report,
      userWithRole(RoleEnum.expert),
    );

    expect(guard.canActivate(context)).toBe(false);
  });

  it('should prefer class metadata over handler metadata', () => {
    const context = contextFor(
      StatisticsController,
      StatisticsController.prototype.summary,
      userWithRole(RoleEnum.viewer),
    );

    expect(guard.canActivate(context)).toBe(false);
  });

  it('should deny a request without a user', () => {
    const context = contextFor(
      StatisticsController,
      StatisticsController.prototype.report,
      undefined,
    );

    expect(guard.canActivate(context)).toBe(false);
  });
});
