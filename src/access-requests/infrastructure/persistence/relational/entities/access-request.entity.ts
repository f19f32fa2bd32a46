import {
  Check,
  Column,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  OneToMany,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { AccessRequestStatus } from '../../../../domain/enums/access-request-status.enum';
import { IssuingEntityEntity } from '../../../../../issuing-entities/infrastructure/persistence/relational/entities/issuing-entity.entity';
import { PersonEntity } from '../../../../../persons/infrastructure/persistence/relational/entities/person.entity';
import { AccessRequestItemEntity } from './access-request-item.entity';

/**
 * Access Request Entity (Database)
 *
 * decided_at is null exactly while status is pending (CHECK constraint).
 */
@Entity('access_requests')
@Index(['ownerPersonId', 'requestedAt'])
@Index(['requesterEntityId', 'requestedAt'])
@Check(`"status" IN ('pending', 'approved', 'rejected', 'expired')`)
@Check(`("status" = 'pending') = ("decided_at" IS NULL)`)
export class AccessRequestEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'integer', name: 'entity_id' })
  requesterEntityId!: number;

  @ManyToOne(() => IssuingEntityEntity, { nullable: false })
  @JoinColumn({ name: 'entity_id' })
  requesterEntity?: IssuingEntityEntity;

  @Column({ type: 'integer', name: 'person_id' })
  ownerPersonId!: number;

  @ManyToOne(() => PersonEntity, { nullable: false })
  @JoinColumn({ name: 'person_id' })
  ownerPerson?: PersonEntity;

  @Column({ type: 'varchar', length: 300 })
  purpose!: string;

  @Column({
    type: 'varchar',
    length: 20,
    default: AccessRequestStatus.PENDING,
  })
  status!: AccessRequestStatus;

  @Column({ type: 'timestamptz', name: 'requested_at' })
  requestedAt!: Date;

  @Column({ type: 'timestamptz', name: 'decided_at', nullable: true })
  decidedAt!: Date | null;

  @Column({ type: 'timestamptz', name: 'expires_at' })
  expiresAt!: Date;

  @Column({
    type: 'varchar',
    length: 300,
    name: 'decision_note',
    nullable: true,
  })
  decisionNote!: string | null;

  @OneToMany(() => AccessRequestItemEntity, (item) => item.accessRequest)
  items?: AccessRequestItemEntity[];
}
