import {
  Check,
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { IdType } from '../../../../domain/enums/id-type.enum';

@Entity('persons')
@Index(['idType', 'idNumber'], { unique: true })
@Check(`"id_type" IN ('CC', 'CE', 'PA', 'NIT', 'TI', 'PEP', 'OTRO')`)
export class PersonEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 10, name: 'id_type' })
  idType!: IdType;

  @Column({ type: 'varchar', length: 40, name: 'id_number' })
  idNumber!: string;

  @Column({ type: 'varchar', length: 120, name: 'first_name' })
  firstName!: string;

  @Column({ type: 'varchar', length: 120, name: 'last_name' })
  lastName!: string;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;
}
