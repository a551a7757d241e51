import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { WorkflowActionType } from '../../../../domain/enums/workflow-action-type.enum';
import { ActionDetails } from '../../../../domain/entities/workflow-history.entity';
import { OpinionRequestEntity } from './opinion-request.entity';

@Entity({
  name: 'workflow_history',
})
export class WorkflowHistoryEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @ManyToOne(() => OpinionRequestEntity, { nullable: false })
  @JoinColumn({ name: 'opinion_request_id' })
  request?: OpinionRequestEntity;

  @Column({ name: 'opinion_request_id', type: 'integer' })
  @Index()
  requestId!: number;

  @Column({ name: 'action_type', type: 'varchar', length: 50 })
  actionType!: WorkflowActionType;

  @Column({ name: 'action_by', type: 'integer' })
  actionBy!: number;

  @Column({ name: 'from_status_id', type: 'integer', nullable: true })
  fromStatusId!: number | null;

  @Column({ name: 'to_status_id', type: 'integer' })
  toStatusId!: number;

  @Column({ name: 'action_details', type: 'jsonb', default: () => "'{}'" })
  actionDetails!: ActionDetails;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
