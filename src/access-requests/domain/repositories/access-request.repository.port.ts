import { NullableType } from '../../../utils/types/nullable.type';
import { AccessRequest } from '../entities/access-request.entity';
import { AccessRequestStatus } from '../enums/access-request-status.enum';

export type NewAccessRequest = Omit<AccessRequest, 'id' | 'items'> & {
  personDocumentIds: number[];
};

export interface AccessRequestDecision {
  status: Exclude<AccessRequestStatus, AccessRequestStatus.PENDING>;
  decidedAt: Date;
  decisionNote: string | null;
}

/**
 * Repository Port for AccessRequest (Hexagonal Architecture)
 *
 * Reads always include the request's items. Lists are ordered by
 * requestedAt, newest first.
 */
export abstract class AccessRequestRepositoryPort {
  /**
   * Persist a request and all its items atomically
   */
  abstract createWithItems(request: NewAccessRequest): Promise<AccessRequest>;

  abstract findByIdWithItems(id: number): Promise<NullableType<AccessRequest>>;

  abstract findByOwnerPersonId(personId: number): Promise<AccessRequest[]>;

  abstract findByRequesterEntityId(entityId: number): Promise<AccessRequest[]>;

  /**
   * Apply a decision only if the request is still pending (compare-and-swap).
   *
   * @returns false when another decision won the race
   */
  abstract applyDecisionIfPending(
    id: number,
    decision: AccessRequestDecision,
  ): Promise<boolean>;
}
