import { NullableType } from '../../../utils/types/nullable.type';
import { IssuingEntity } from '../entities/issuing-entity.entity';

export abstract class IssuingEntityRepositoryPort {
  abstract findById(id: number): Promise<NullableType<IssuingEntity>>;
}
