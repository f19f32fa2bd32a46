import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { IssuingEntityRepositoryPort } from '../../../../domain/repositories/issuing-entity.repository.port';
import { IssuingEntity } from '../../../../domain/entities/issuing-entity.entity';
import { IssuingEntityEntity } from '../entities/issuing-entity.entity';
import { NullableType } from '../../../../../utils/types/nullable.type';

@Injectable()
export class IssuingEntityRelationalRepository extends IssuingEntityRepositoryPort {
  constructor(
    @InjectRepository(IssuingEntityEntity)
    private readonly repository: Repository<IssuingEntityEntity>,
  ) {
    super();
  }

  async findById(id: number): Promise<NullableType<IssuingEntity>> {
    const entity = await this.repository.findOne({ where: { id } });
    if (!entity) {
      return null;
    }

    return {
      id: entity.id,
      name: entity.name,
      status: entity.status,
      createdAt: entity.createdAt,
    };
  }
}
