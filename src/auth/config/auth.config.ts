import { registerAs } from '@nestjs/config';

import { IsString, IsOptional } from 'class-validator';
import validateConfig from '../../utils/validate-config';
import { AuthConfig } from './auth-config.type';

class EnvironmentVariablesValidator {
  @IsString()
  AUTH_JWT_SECRET!: string;

  // JWT standards
  @IsString()
  @IsOptional()
  AUTH_JWT_ISSUER?: string;

  @IsString()
  @IsOptional()
  AUTH_JWT_AUDIENCE?: string;
}

export default registerAs<AuthConfig>('auth', () => {
  validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    secret: process.env.AUTH_JWT_SECRET,
    jwtIssuer: process.env.AUTH_JWT_ISSUER,
    jwtAudience: process.env.AUTH_JWT_AUDIENCE,
  };
});
