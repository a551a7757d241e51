import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Expose } from 'class-transformer';
import { ActionDetails } from '../domain/entities/workflow-history.entity';
import { WorkflowActionType } from '../domain/enums/workflow-action-type.enum';

export class WorkflowHistoryResponseDto {
  @ApiProperty()
  @Expose()
  id!: number;

  @ApiProperty()
  @Expose()
  requestId!: number;

  @ApiProperty({ enum: WorkflowActionType })
  @Expose()
  actionType!: WorkflowActionType;

  @ApiProperty()
  @Expose()
  actionBy!: number;

  @ApiPropertyOptional({ type: Number, nullable: true })
  @Expose()
  fromStatusId!: number | null;

  @ApiProperty()
  @Expose()
  toStatusId!: number;

  @ApiProperty({
    type: 'object',
    additionalProperties: true,
    example: { changedFields: ['title', 'dueDate'] },
  })
  @Expose()
  actionDetails!: ActionDetails;

  @ApiProperty()
  @Expose()
  createdAt!: Date;
}
