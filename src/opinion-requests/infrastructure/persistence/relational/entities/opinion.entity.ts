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
import { OpinionStatus } from '../../../../domain/enums/opinion-status.enum';
import { OpinionRequestEntity } from './opinion-request.entity';

@Entity({
  name: 'opinions',
})
export class OpinionEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @ManyToOne(() => OpinionRequestEntity, { nullable: false })
  @JoinColumn({ name: 'opinion_request_id' })
  request?: OpinionRequestEntity;

  @Column({ name: 'opinion_request_id', type: 'integer' })
  @Index()
  requestId!: number;

  @Column({ name: 'department_id', type: 'integer' })
  departmentId!: number;

  @Column({ name: 'expert_id', type: 'integer' })
  @Index()
  expertId!: number;

  @Column({ type: 'text' })
  content!: string;

  @Column({ type: 'text', nullable: true })
  recommendation!: string | null;

  @Column({ type: 'varchar', length: 20, default: OpinionStatus.DRAFT })
  status!: OpinionStatus;

  @Column({ name: 'review_comments', type: 'text', nullable: true })
  reviewComments!: string | null;

  @Column({ name: 'reviewed_by', type: 'integer', nullable: true })
  reviewedBy!: number | null;

  @Column({ name: 'reviewed_at', type: 'timestamp', nullable: true })
  reviewedAt!: Date | null;

  @Column({ name: 'submitted_at', type: 'timestamp', nullable: true })
  submittedAt!: Date | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
