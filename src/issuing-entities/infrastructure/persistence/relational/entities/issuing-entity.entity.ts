import {
  Check,
  Column,
  CreateDateColumn,
  Entity,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { IssuingEntityStatus } from '../../../../domain/entities/issuing-entity.entity';

@Entity('issuing_entities')
@Check(`"status" IN ('pending', 'approved', 'blocked')`)
export class IssuingEntityEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 200, unique: true })
  name!: string;

  @Column({ type: 'varchar', length: 20, default: 'pending' })
  status!: IssuingEntityStatus;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;
}
