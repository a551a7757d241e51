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

@Entity({
  name: 'request_remarks',
})
export class RemarkEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @ManyToOne(() => OpinionRequestEntity, { nullable: false })
  @JoinColumn({ name: 'opinion_request_id' })
  request?: OpinionRequestEntity;

  @Column({ name: 'opinion_request_id', type: 'integer' })
  @Index()
  requestId!: number;

  @Column({ name: 'user_id', type: 'integer' })
  userId!: number;

  @Column({ type: 'text' })
  content!: string;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
