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
  name: 'request_documents',
})
export class RequestDocumentEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @ManyToOne(() => OpinionRequestEntity, { nullable: false })
  @JoinColumn({ name: 'opinion_request_id' })
  request?: OpinionRequestEntity;

  @Column({ name: 'opinion_request_id', type: 'integer' })
  @Index()
  requestId!: number;

  @Column({ name: 'file_name', type: 'varchar', length: 255 })
  fileName!: string;

  @Column({ name: 'stored_name', type: 'varchar', length: 300 })
  storedName!: string;

  @Column({ name: 'file_path', type: 'varchar', length: 1024 })
  filePath!: string;

  @Column({ name: 'file_type', type: 'varchar', length: 255 })
  fileType!: string;

  @Column({ name: 'file_size', type: 'integer' })
  fileSize!: number;

  @Column({ name: 'uploaded_by', type: 'integer' })
  uploadedBy!: number;

  @Column({ type: 'text', nullable: true })
  remarks!: string | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
