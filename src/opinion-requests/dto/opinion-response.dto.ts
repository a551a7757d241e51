import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Expose } from 'class-transformer';
import { OpinionStatus } from '../domain/enums/opinion-status.enum';

export class OpinionResponseDto {
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
  expertId!: number;

  @ApiProperty()
  @Expose()
  content!: string;

  @ApiPropertyOptional({ type: String, nullable: true })
  @Expose()
  recommendation!: string | null;

  @ApiProperty({ enum: OpinionStatus })
  @Expose()
  status!: OpinionStatus;

  @ApiPropertyOptional({ type: String, nullable: true })
  @Expose()
  reviewComments!: string | null;

  @ApiPropertyOptional({ type: Number, nullable: true })
  @Expose()
  reviewedBy!: number | null;

  @ApiPropertyOptional({ type: Date, nullable: true })
  @Expose()
  reviewedAt!: Date | null;

  @ApiPropertyOptional({ type: Date, nullable: true })
  @Expose()
  submittedAt!: Date | null;

  @ApiProperty()
  @Expose()
  createdAt!: Date;

  @ApiProperty()
  @Expose()
  updatedAt!: Date;
}
