import {
  Check,
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  OneToMany,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { ReviewStatus } from '../../../../domain/enums/review-status.enum';
import { DocumentDefinitionEntity } from './document-definition.entity';
import { FileRecordEntity } from './file-record.entity';

@Entity('person_documents')
@Index(['personId', 'reviewStatus'])
@Check(`"review_status" IN ('pending', 'approved', 'rejected')`)
export class PersonDocumentEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'integer', name: 'person_id' })
  personId!: number;

  @Column({ type: 'integer', name: 'document_definition_id', nullable: true })
  documentDefinitionId!: number | null;

  @ManyToOne(() => DocumentDefinitionEntity, { nullable: true })
  @JoinColumn({ name: 'document_definition_id' })
  documentDefinition?: DocumentDefinitionEntity | null;

  @Column({ type: 'integer', name: 'issuer_entity_id', nullable: true })
  issuerEntityId!: number | null;

  @Column({
    type: 'varchar',
    length: 20,
    name: 'review_status',
    default: ReviewStatus.PENDING,
  })
  reviewStatus!: ReviewStatus;

  @OneToMany(() => FileRecordEntity, (file) => file.personDocument)
  files?: FileRecordEntity[];

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;
}
