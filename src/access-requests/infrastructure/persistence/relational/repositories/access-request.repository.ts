import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsRelations, FindOptionsWhere, Repository } from 'typeorm';
import {
  AccessRequestDecision,
  AccessRequestRepositoryPort,
  NewAccessRequest,
} from '../../../../domain/repositories/access-request.repository.port';
import {
  AccessRequest,
  AccessRequestItem,
} from '../../../../domain/entities/access-request.entity';
import { AccessRequestStatus } from '../../../../domain/enums/access-request-status.enum';
import { AccessRequestIntegrityError } from '../../../../domain/errors/access-request.errors';
import { AccessRequestEntity } from '../entities/access-request.entity';
import { AccessRequestItemEntity } from '../entities/access-request-item.entity';
import { NullableType } from '../../../../../utils/types/nullable.type';

const WITH_ITEMS: FindOptionsRelations<AccessRequestEntity> = {
  items: { personDocument: { documentDefinition: true } },
};

/**
 * Relational Repository Implementation for AccessRequest
 *
 * Maps between domain entities and TypeORM entities.
 */
@Injectable()
export class AccessRequestRelationalRepository extends AccessRequestRepositoryPort {
  constructor(
    @InjectRepository(AccessRequestEntity)
    private readonly repository: Repository<AccessRequestEntity>,
  ) {
    super(); // Required when extending abstract class
  }

  async createWithItems(request: NewAccessRequest): Promise<AccessRequest> {
    const id = await this.repository.manager.transaction(async (manager) => {
      const saved = await manager.save(
        manager.create(AccessRequestEntity, {
          requesterEntityId: request.requesterEntityId,
          ownerPersonId: request.ownerPersonId,
          purpose: request.purpose,
          status: request.status,
          requestedAt: request.requestedAt,
          decidedAt: request.decidedAt,
          expiresAt: request.expiresAt,
          decisionNote: request.decisionNote,
        }),
      );
      await manager.save(
        request.personDocumentIds.map((personDocumentId) =>
          manager.create(AccessRequestItemEntity, {
            accessRequestId: saved.id,
            personDocumentId,
          }),
        ),
      );
      return saved.id;
    });

    const created = await this.findByIdWithItems(id);
    if (!created) {
      throw new AccessRequestIntegrityError(
        `Access request ${id} vanished after creation`,
      );
    }
    return created;
  }

  async findByIdWithItems(id: number): Promise<NullableType<AccessRequest>> {
    const entity = await this.repository.findOne({
      where: { id },
      relations: WITH_ITEMS,
      order: { items: { id: 'ASC' } },
    });

    return entity ? this.toDomain(entity) : null;
  }

  async findByOwnerPersonId(personId: number): Promise<AccessRequest[]> {
    return this.findOrdered({ ownerPersonId: personId });
  }

  async findByRequesterEntityId(entityId: number): Promise<AccessRequest[]> {
    return this.findOrdered({ requesterEntityId: entityId });
  }

  async applyDecisionIfPending(
    id: number,
    decision: AccessRequestDecision,
  ): Promise<boolean> {
    // Conditional UPDATE: the status predicate makes the transition a CAS
    const result = await this.repository.update(
      { id, status: AccessRequestStatus.PENDING },
      {
        status: decision.status,
        decidedAt: decision.decidedAt,
        decisionNote: decision.decisionNote,
      },
    );
    return (result.affected ?? 0) > 0;
  }

  private async findOrdered(
    where: FindOptionsWhere<AccessRequestEntity>,
  ): Promise<AccessRequest[]> {
    const entities = await this.repository.find({
      where,
      relations: WITH_ITEMS,
      order: { requestedAt: 'DESC', id: 'DESC', items: { id: 'ASC' } },
    });

    return entities.map((entity) => this.toDomain(entity));
  }

  private toDomain(entity: AccessRequestEntity): AccessRequest {
    return {
      id: entity.id,
      requesterEntityId: entity.requesterEntityId,
      ownerPersonId: entity.ownerPersonId,
      purpose: entity.purpose,
      status: entity.status,
      requestedAt: entity.requestedAt,
      decidedAt: entity.decidedAt,
      expiresAt: entity.expiresAt,
      decisionNote: entity.decisionNote,
      items: (entity.items ?? []).map((item) => this.itemToDomain(item)),
    };
  }

  private itemToDomain(item: AccessRequestItemEntity): AccessRequestItem {
    return {
      id: item.id,
      accessRequestId: item.accessRequestId,
      personDocumentId: item.personDocumentId,
      documentTitle: item.personDocument?.documentDefinition?.title ?? null,
    };
  }
}
