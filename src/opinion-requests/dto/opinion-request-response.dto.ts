import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Expose } from 'class-transformer';
import { RequestPriority } from '../domain/enums/request-priority.enum';
import { WorkflowStatusName } from '../domain/enums/workflow-status-name.enum';

export class OpinionRequestResponseDto {
  @ApiProperty()
  @Expose()
  id!: number;

  @ApiProperty({ example: 'OPN-3FA2C91B' })
  @Expose()
  referenceNumber!: string;

  @ApiProperty()
  @Expose()
  title!: string;

  @ApiPropertyOptional({ type: String, nullable: true })
  @Expose()
  description!: string | null;

  @ApiProperty()
  @Expose()
  requesterId!: number;

  @ApiProperty()
  @Expose()
  departmentId!: number;

  @ApiProperty()
  @Expose()
  categoryId!: number;

  @ApiPropertyOptional({ type: Number, nullable: true })
  @Expose()
  subcategoryId!: number | null;

  @ApiProperty({ enum: RequestPriority })
  @Expose()
  priority!: RequestPriority;

  @ApiProperty({ enum: WorkflowStatusName })
  @Expose()
  status!: WorkflowStatusName;

  @ApiProperty()
  @Expose()
  currentStatusId!: number;

  @ApiPropertyOptional({ type: Date, nullable: true })
  @Expose()
  dueDate!: Date | null;

  @ApiProperty({ description: 'Grows by one on every change' })
  @Expose()
  version!: number;

  @ApiPropertyOptional({ type: String, nullable: true })
  @Expose()
  requestStatement!: string | null;

  @ApiPropertyOptional({ type: String, nullable: true })
  @Expose()
  challengesOpportunities!: string | null;

  @ApiPropertyOptional({ type: String, nullable: true })
  @Expose()
  subjectContent!: string | null;

  @ApiPropertyOptional({ type: String, nullable: true })
  @Expose()
  alternatives!: string | null;

  @ApiPropertyOptional({ type: String, nullable: true })
  @Expose()
  expectedImpact!: string | null;

  @ApiPropertyOptional({ type: String, nullable: true })
  @Expose()
  potentialRisks!: string | null;

  @ApiPropertyOptional({ type: String, nullable: true })
  @Expose()
  studiesStatistics!: string | null;

  @ApiPropertyOptional({ type: String, nullable: true })
  @Expose()
  legalFinancialOpinions!: string | null;

  @ApiPropertyOptional({ type: String, nullable: true })
  @Expose()
  stakeholderFeedback!: string | null;

  @ApiPropertyOptional({ type: String, nullable: true })
  @Expose()
  workPlan!: string | null;

  @ApiPropertyOptional({ type: String, nullable: true })
  @Expose()
  decisionDraft!: string | null;

  @ApiProperty()
  @Expose()
  createdAt!: Date;

  @ApiProperty()
  @Expose()
  updatedAt!: Date;
}
