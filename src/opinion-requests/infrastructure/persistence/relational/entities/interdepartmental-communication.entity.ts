import {
  Check,
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { CommunicationStatus } from '../../../../domain/enums/communication-status.enum';
import { RequestPriority } from '../../../../domain/enums/request-priority.enum';
import { OpinionRequestEntity } from './opinion-request.entity';

@Entity({
  name: 'interdepartmental_communications',
})
@Check('CHK_communications_distinct_departments', '"to_department_id" <> "from_department_id"')
export class InterdepartmentalCommunicationEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @ManyToOne(() => OpinionRequestEntity, { nullable: false })
  @JoinColumn({ name: 'opinion_request_id' })
  request?: OpinionRequestEntity;

  @Column({ name: 'opinion_request_id', type: 'integer' })
  @Index()
  requestId!: number;

  @Column({ name: 'from_department_id', type: 'integer' })
  fromDepartmentId!: number;

  @Column({ name: 'to_department_id', type: 'integer' })
  @Index()
  toDepartmentId!: number;

  @Column({ name: 'from_user_id', type: 'integer' })
  fromUserId!: number;

  @Column({ name: 'to_user_id', type: 'integer', nullable: true })
  toUserId!: number | null;

  @Column({ type: 'varchar', length: 255 })
  subject!: string;

  @Column({ type: 'text' })
  content!: string;

  @Column({ type: 'varchar', length: 10 })
  priority!: RequestPriority;

  @Column({ type: 'varchar', length: 20, default: CommunicationStatus.PENDING })
  status!: CommunicationStatus;

  @Column({ name: 'requires_response', type: 'boolean', default: true })
  requiresResponse!: boolean;

  @Column({ name: 'due_date', type: 'timestamp', nullable: true })
  dueDate!: Date | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
