import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Expose } from 'class-transformer';
import { CommunicationStatus } from '../domain/enums/communication-status.enum';
import { RequestPriority } from '../domain/enums/request-priority.enum';

export class CommunicationResponseDto {
  @ApiProperty()
  @Expose()
  id!: number;

  @ApiProperty()
  @Expose()
  requestId!: number;

  @ApiProperty()
  @Expose()
  fromDepartmentId!: number;

  @ApiProperty()
  @Expose()
  toDepartmentId!: number;

  @ApiProperty()
  @Expose()
  fromUserId!: number;

  @ApiPropertyOptional({ type: Number, nullable: true })
  @Expose()
  toUserId!: number | null;

  @ApiProperty()
  @Expose()
  subject!: string;

  @ApiProperty()
  @Expose()
  content!: string;

  @ApiProperty({ enum: RequestPriority })
  @Expose()
  priority!: RequestPriority;

  @ApiProperty({ enum: CommunicationStatus })
  @Expose()
  status!: CommunicationStatus;

  @ApiProperty()
  @Expose()
  requiresResponse!: boolean;

  @ApiPropertyOptional({ type: Date, nullable: true })
  @Expose()
  dueDate!: Date | null;

  @ApiProperty()
  @Expose()
  createdAt!: Date;
}
