import { Column, Entity, PrimaryGeneratedColumn } from 'typeorm';

@Entity({
  name: 'workflow_statuses',
})
export class WorkflowStatusEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 50, unique: true })
  name!: string;

  @Column({ type: 'text', nullable: true })
  description!: string | null;
}
