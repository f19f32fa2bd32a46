import { IdType } from '../enums/id-type.enum';

/**
 * Domain entity for Person
 *
 * A citizen who owns documents. Only the fields the disclosure workflow
 * needs are modelled here; identity is (idType, idNumber).
 */
export interface Person {
  id: number;
  idType: IdType;
  idNumber: string;
  firstName: string;
  lastName: string;
  createdAt: Date;
}
