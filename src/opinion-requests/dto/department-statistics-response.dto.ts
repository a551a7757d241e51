import { ApiProperty } from '@nestjs/swagger';
import { Expose } from 'class-transformer';

export class DepartmentStatisticsResponseDto {
  @ApiProperty()
  @Expose()
  departmentId!: number;

  @ApiProperty()
  @Expose()
  totalRequests!: number;

  @ApiProperty({ description: 'Requests in head_approved or completed' })
  @Expose()
  completedRequests!: number;

  @ApiProperty({ description: 'Requests not yet approved, completed or rejected' })
  @Expose()
  pendingRequests!: number;

  @ApiProperty()
  @Expose()
  rejectedRequests!: number;

  @ApiProperty({
    description: 'Mean seconds from creation to last change over completed requests',
  })
  @Expose()
  averageCompletionTime!: number;
}
