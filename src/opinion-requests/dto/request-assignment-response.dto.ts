import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Expose } from 'class-transformer';

export class RequestAssignmentResponseDto {
  @ApiProperty()
  @Expose()
  id!: number;

  @ApiProperty()
  @Expose()
  requestId!: number;

  @ApiProperty()
  @Expose()
  departmentId!: number;

  @ApiProperty()
  @Expose()
  assignedBy!: number;

  @ApiPropertyOptional({ type: Number, nullable: true })
  @Expose()
  expertId!: number | null;

  @ApiProperty({ description: 'Status id at the time of the last change' })
  @Expose()
  statusId!: number;

  @ApiProperty()
  @Expose()
  isPrimary!: boolean;

  @ApiPropertyOptional({ type: Date, nullable: true })
  @Expose()
  dueDate!: Date | null;

  @ApiPropertyOptional({ type: String, nullable: true })
  @Expose()
  remarks!: string | null;

  @ApiProperty()
  @Expose()
  assignedAt!: Date;
}
