import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { PersonDocumentRepositoryPort } from '../../../../domain/repositories/person-document.repository.port';
import { PersonDocument } from '../../../../domain/entities/person-document.entity';
import { ReviewStatus } from '../../../../domain/enums/review-status.enum';
import { PersonDocumentEntity } from '../entities/person-document.entity';
import { PersonDocumentMapper } from '../mappers/person-document.mapper';
import { NullableType } from '../../../../../utils/types/nullable.type';

@Injectable()
export class PersonDocumentRelationalRepository extends PersonDocumentRepositoryPort {
  constructor(
    @InjectRepository(PersonDocumentEntity)
    private readonly repository: Repository<PersonDocumentEntity>,
  ) {
    super();
  }

  async findByIdWithFiles(
    id: number,
  ): Promise<NullableType<PersonDocument>> {
    const entity = await this.repository.findOne({
      where: { id },
      relations: { documentDefinition: true, files: true },
      order: { files: { id: 'ASC' } },
    });

    return entity ? PersonDocumentMapper.toDomain(entity) : null;
  }

  async findApprovedByPersonId(personId: number): Promise<PersonDocument[]> {
    const entities = await this.repository.find({
      where: { personId, reviewStatus: ReviewStatus.APPROVED },
      relations: { documentDefinition: true, files: true },
      order: { createdAt: 'ASC', files: { id: 'ASC' } },
    });

    return entities.map((entity) => PersonDocumentMapper.toDomain(entity));
  }
}
