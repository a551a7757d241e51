import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsEnum, IsOptional, IsString } from 'class-validator';
import { WorkflowStatusName } from '../domain/enums/workflow-status-name.enum';

export class ChangeStatusDto {
  @ApiProperty({
    enum: [
      WorkflowStatusName.IN_REVIEW,
      WorkflowStatusName.ADDITIONAL_INFO_REQUESTED,
      WorkflowStatusName.PENDING_OTHER_DEPARTMENT,
      WorkflowStatusName.HEAD_REVIEW_PENDING,
    ],
  })
  @IsEnum(WorkflowStatusName)
  status!: WorkflowStatusName;

  @ApiPropertyOptional({ type: String, nullable: true })
  @IsOptional()
  @IsString()
  remarks?: string | null;
}
