import { Module } from '@nestjs/common';
import { PassportModule } from '@nestjs/passport';
import { JwtStrategy } from './strategies/jwt.strategy';
import { AuditModule } from '../audit/audit.module';

@Module({
  imports: [PassportModule, AuditModule],
  providers: [JwtStrategy],
  exports: [PassportModule],
})
export class AuthModule {}
