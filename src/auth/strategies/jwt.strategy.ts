import { ExtractJwt, Strategy } from 'passport-jwt';
import { Injectable, UnauthorizedException } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { ConfigService } from '@nestjs/config';
import { JwtPayloadType } from './types/jwt-payload.type';
import { AllConfigType } from '../../config/config.type';
import { AuditService, WorkflowEventType } from '../../audit/audit.service';

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy, 'jwt') {
  constructor(
    private readonly auditService: AuditService,
    configService: ConfigService<AllConfigType>,
  ) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      secretOrKey: configService.getOrThrow('auth.secret', { infer: true }),
      issuer: configService.get('auth.jwtIssuer', { infer: true }),
      audience: configService.get('auth.jwtAudience', { infer: true }),
    });
  }

  // Tokens are issued by the identity provider; the user row is not
  // re-read here. Inactive accounts are rejected before reaching the engine.
  public validate(payload: Partial<JwtPayloadType>): JwtPayloadType {
    if (!payload.id || !payload.role?.id) {
      throw new UnauthorizedException();
    }

    if (payload.isActive === false) {
      this.auditService.logWorkflowEvent({
        userId: payload.id,
        event: WorkflowEventType.INACTIVE_ACTOR_REJECTED,
        success: false,
        errorMessage: 'Token presented for an inactive account',
      });
      throw new UnauthorizedException();
    }

    return {
      id: payload.id,
      role: payload.role,
      departmentId: payload.departmentId ?? null,
      isActive: true,
      permissions: payload.permissions ?? [],
      iat: payload.iat,
      exp: payload.exp,
    };
  }
}
