import {
  Column,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { PersonDocumentEntity } from '../../../../../person-documents/infrastructure/persistence/relational/entities/person-document.entity';
import { AccessRequestEntity } from './access-request.entity';

@Entity('access_request_items')
@Index(['accessRequestId', 'personDocumentId'], { unique: true })
export class AccessRequestItemEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'integer', name: 'access_request_id' })
  accessRequestId!: number;

  @ManyToOne(() => AccessRequestEntity, (request) => request.items, {
    nullable: false,
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'access_request_id' })
  accessRequest?: AccessRequestEntity;

  @Column({ type: 'integer', name: 'person_document_id' })
  personDocumentId!: number;

  @ManyToOne(() => PersonDocumentEntity, { nullable: false })
  @JoinColumn({ name: 'person_document_id' })
  personDocument?: PersonDocumentEntity;
}
