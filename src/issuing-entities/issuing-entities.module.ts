import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { IssuingEntityEntity } from './infrastructure/persistence/relational/entities/issuing-entity.entity';
import { IssuingEntityRepositoryPort } from './domain/repositories/issuing-entity.repository.port';
import { IssuingEntityRelationalRepository } from './infrastructure/persistence/relational/repositories/issuing-entity.repository';

@Module({
  imports: [TypeOrmModule.forFeature([IssuingEntityEntity])],
  providers: [
    {
      provide: IssuingEntityRepositoryPort,
      useClass: IssuingEntityRelationalRepository,
    },
  ],
  exports: [IssuingEntityRepositoryPort],
})
export class IssuingEntitiesModule {}
