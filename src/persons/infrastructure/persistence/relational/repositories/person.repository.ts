import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { PersonRepositoryPort } from '../../../../domain/repositories/person.repository.port';
import { Person } from '../../../../domain/entities/person.entity';
import { PersonEntity } from '../entities/person.entity';
import { NullableType } from '../../../../../utils/types/nullable.type';

@Injectable()
export class PersonRelationalRepository extends PersonRepositoryPort {
  constructor(
    @InjectRepository(PersonEntity)
    private readonly repository: Repository<PersonEntity>,
  ) {
    super();
  }

  async findById(id: number): Promise<NullableType<Person>> {
    const entity = await this.repository.findOne({ where: { id } });
    return entity ? this.toDomain(entity) : null;
  }

  private toDomain(entity: PersonEntity): Person {
    return {
      id: entity.id,
      idType: entity.idType,
      idNumber: entity.idNumber,
      firstName: entity.firstName,
      lastName: entity.lastName,
      createdAt: entity.createdAt,
    };
  }
}
