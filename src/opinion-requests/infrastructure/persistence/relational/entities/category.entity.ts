import {
  Column,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';

@Entity({
  name: 'categories',
})
export class CategoryEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 255, unique: true })
  name!: string;
}

@Entity({
  name: 'subcategories',
})
export class SubcategoryEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @ManyToOne(() => CategoryEntity, { nullable: false })
  @JoinColumn({ name: 'category_id' })
  category?: CategoryEntity;

  @Column({ name: 'category_id', type: 'integer' })
  @Index()
  categoryId!: number;

  @Column({ type: 'varchar', length: 255 })
  name!: string;
}
