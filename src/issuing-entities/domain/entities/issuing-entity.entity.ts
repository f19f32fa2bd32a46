/**
 * Domain entity for IssuingEntity
 *
 * An organization that issues documents to persons and requests access
 * to documents it did not issue.
 */
export interface IssuingEntity {
  id: number;
  name: string;
  status: IssuingEntityStatus;
  createdAt: Date;
}

export type IssuingEntityStatus = 'pending' | 'approved' | 'blocked';
