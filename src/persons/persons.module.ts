import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { PersonEntity } from './infrastructure/persistence/relational/entities/person.entity';
import { PersonRepositoryPort } from './domain/repositories/person.repository.port';
import { PersonRelationalRepository } from './infrastructure/persistence/relational/repositories/person.repository';

@Module({
  imports: [TypeOrmModule.forFeature([PersonEntity])],
  providers: [
    {
      provide: PersonRepositoryPort,
      useClass: PersonRelationalRepository,
    },
  ],
  exports: [PersonRepositoryPort],
})
export class PersonsModule {}
