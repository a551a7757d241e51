import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { OpinionRequestEntity } from './opinion-request.entity';
import { WorkflowStatusEntity } from './workflow-status.entity';

/**
 * At most one primary assignment per request, backed by the partial unique
 * index IDX_request_assignments_single_primary (see migrations).
 */
@Entity({
  name: 'request_assignments',
})
export class RequestAssignmentEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @ManyToOne(() => OpinionRequestEntity, { nullable: false })
  @JoinColumn({ name: 'opinion_request_id' })
  request?: OpinionRequestEntity;

  @Column({ name: 'opinion_request_id', type: 'integer' })
  @Index()
  requestId!: number;

  @Column({ name: 'department_id', type: 'integer' })
  @Index()
  departmentId!: number;

  @Column({ name: 'assigned_by', type: 'integer' })
  assignedBy!: number;

  @Column({ name: 'expert_id', type: 'integer', nullable: true })
  @Index()
  expertId!: number | null;

  @ManyToOne(() => WorkflowStatusEntity, { nullable: false })
  @JoinColumn({ name: 'status_id' })
  status?: WorkflowStatusEntity;

  @Column({ name: 'status_id', type: 'integer' })
  statusId!: number;

  @CreateDateColumn({ name: 'assigned_at' })
  assignedAt!: Date;

  @Column({ name: 'due_date', type: 'timestamp', nullable: true })
  dueDate!: Date | null;

  @Column({ name: 'is_primary', type: 'boolean', default: false })
  isPrimary!: boolean;

  @Column({ type: 'text', nullable: true })
  remarks!: string | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
