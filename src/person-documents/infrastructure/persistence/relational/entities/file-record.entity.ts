import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { PersonDocumentEntity } from './person-document.entity';

@Entity('files')
@Index(['personDocumentId', 'version'])
export class FileRecordEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'integer', name: 'person_document_id' })
  personDocumentId!: number;

  @ManyToOne(() => PersonDocumentEntity, (document) => document.files, {
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'person_document_id' })
  personDocument?: PersonDocumentEntity;

  @Column({ type: 'varchar', length: 255, name: 'original_name', nullable: true })
  originalName!: string | null;

  @Column({ type: 'varchar', length: 120, name: 'mime_type', nullable: true })
  mimeType!: string | null;

  @Column({ type: 'bigint', name: 'byte_size', nullable: true })
  byteSize!: string | null; // pg returns bigint as string

  @Column({ type: 'char', length: 64, name: 'sha256_hex', nullable: true })
  sha256Hex!: string | null;

  @Column({ type: 'varchar', length: 500, name: 'storage_path', nullable: true })
  storagePath!: string | null;

  @Column({ type: 'integer', nullable: true })
  version!: number | null;

  @CreateDateColumn({ type: 'timestamptz', name: 'uploaded_at' })
  uploadedAt!: Date;
}
