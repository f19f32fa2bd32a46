import { Column, Entity, PrimaryGeneratedColumn } from 'typeorm';

@Entity('document_definitions')
export class DocumentDefinitionEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 200 })
  title!: string;
}
