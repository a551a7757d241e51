import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { RequestPriority } from '../../../../domain/enums/request-priority.enum';
import { DepartmentEntity } from '../../../../../departments/infrastructure/persistence/relational/entities/department.entity';
import { CategoryEntity, SubcategoryEntity } from './category.entity';
import { WorkflowStatusEntity } from './workflow-status.entity';

@Entity({
  name: 'opinion_requests',
})
export class OpinionRequestEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'reference_number', type: 'varchar', length: 20, unique: true })
  referenceNumber!: string;

  @Column({ type: 'varchar', length: 255 })
  title!: string;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @Column({ name: 'requester_id', type: 'integer' })
  @Index()
  requesterId!: number;

  @ManyToOne(() => DepartmentEntity, { nullable: false })
  @JoinColumn({ name: 'department_id' })
  department?: DepartmentEntity;

  @Column({ name: 'department_id', type: 'integer' })
  @Index()
  departmentId!: number;

  @ManyToOne(() => CategoryEntity, { nullable: false })
  @JoinColumn({ name: 'category_id' })
  category?: CategoryEntity;

  @Column({ name: 'category_id', type: 'integer' })
  @Index()
  categoryId!: number;

  @ManyToOne(() => SubcategoryEntity, { nullable: true })
  @JoinColumn({ name: 'subcategory_id' })
  subcategory?: SubcategoryEntity | null;

  @Column({ name: 'subcategory_id', type: 'integer', nullable: true })
  subcategoryId!: number | null;

  @Column({ type: 'varchar', length: 10, default: RequestPriority.MEDIUM })
  priority!: RequestPriority;

  @ManyToOne(() => WorkflowStatusEntity, { nullable: false })
  @JoinColumn({ name: 'current_status_id' })
  currentStatus?: WorkflowStatusEntity;

  @Column({ name: 'current_status_id', type: 'integer' })
  @Index()
  currentStatusId!: number;

  @Column({ name: 'due_date', type: 'timestamp', nullable: true })
  dueDate!: Date | null;

  @Column({ type: 'integer', default: 1 })
  version!: number;

  // Free-text sections
  @Column({ name: 'request_statement', type: 'text', nullable: true })
  requestStatement!: string | null;

  @Column({ name: 'challenges_opportunities', type: 'text', nullable: true })
  challengesOpportunities!: string | null;

  @Column({ name: 'subject_content', type: 'text', nullable: true })
  subjectContent!: string | null;

  @Column({ type: 'text', nullable: true })
  alternatives!: string | null;

  @Column({ name: 'expected_impact', type: 'text', nullable: true })
  expectedImpact!: string | null;

  @Column({ name: 'potential_risks', type: 'text', nullable: true })
  potentialRisks!: string | null;

  @Column({ name: 'studies_statistics', type: 'text', nullable: true })
  studiesStatistics!: string | null;

  @Column({ name: 'legal_financial_opinions', type: 'text', nullable: true })
  legalFinancialOpinions!: string | null;

  @Column({ name: 'stakeholder_feedback', type: 'text', nullable: true })
  stakeholderFeedback!: string | null;

  @Column({ name: 'work_plan', type: 'text', nullable: true })
  workPlan!: string | null;

  @Column({ name: 'decision_draft', type: 'text', nullable: true })
  decisionDraft!: string | null;

  // Soft delete
  @Column({ name: 'is_deleted', type: 'boolean', default: false })
  @Index()
  isDeleted!: boolean;

  @Column({ name: 'deleted_by', type: 'integer', nullable: true })
  deletedBy!: number | null;

  @Column({ name: 'deleted_at', type: 'timestamp', nullable: true })
  deletedAt!: Date | null;

  @CreateDateColumn({ name: 'created_at' })
  @Index()
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
