import { Request } from 'express';
import { RoleEnum } from '../../../roles/roles.enum';

export type JwtPayloadType = {
  id: number;
  role: { id: RoleEnum };
  departmentId: number | null;
  isActive: boolean;
  permissions: string[];
  iat?: number;
  exp?: number;
};

export type AuthenticatedRequest = Request & { user?: JwtPayloadType };
