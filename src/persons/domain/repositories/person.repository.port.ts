import { NullableType } from '../../../utils/types/nullable.type';
import { Person } from '../entities/person.entity';

export abstract class PersonRepositoryPort {
  abstract findById(id: number): Promise<NullableType<Person>>;
}
