import { ForbiddenException, Injectable } from '@nestjs/common';
import { plainToClass } from 'class-transformer';
import { AccessRequestDomainService } from './domain/services/access-request.domain.service';
import { AccessRequest } from './domain/entities/access-request.entity';
import {
  AccessRequestErrorCode,
  AccessRequestValidationError,
} from './domain/errors/access-request.errors';
import { CreateAccessRequestDto } from './dto/create-access-request.dto';
import { DecideAccessRequestDto } from './dto/decide-access-request.dto';
import { ListAccessRequestsDto } from './dto/list-access-requests.dto';
import { AccessRequestResponseDto } from './dto/access-request-response.dto';
import { LedgerTraceResponseDto } from './dto/ledger-trace-response.dto';
import { StoredFileHandle } from '../person-documents/domain/ports/file-storage.port';
import { InfinityPaginationResponseDto } from '../utils/dto/infinity-pagination-response.dto';
import { infinityPagination } from '../utils/infinity-pagination';
import { AuditService, DisclosureEventType } from '../audit/audit.service';
import { Actor, ActorType } from '../auth/types/actor.type';

/**
 * Access Requests Service (Application Layer)
 *
 * Thin facade over AccessRequestDomainService that handles:
 * - Which actor type may call which operation
 * - DTO transformations (domain → response DTO)
 * - Status filtering and pagination
 *
 * Business logic lives in the domain service.
 */
@Injectable()
export class AccessRequestsService {
  constructor(
    private readonly domainService: AccessRequestDomainService,
    private readonly auditService: AuditService,
  ) {}

  async createRequest(
    dto: CreateAccessRequestDto,
    actor: Actor,
  ): Promise<AccessRequestResponseDto> {
    this.requireActorType(actor, 'issuer');
    const request = await this.domainService.createRequest(
      actor.id,
      dto.personId,
      dto.purpose,
      dto.personDocumentIds,
    );
    return this.toResponseDto(request);
  }

  /**
   * Persons see requests for their documents; issuers see their own requests.
   */
  async listRequests(
    query: ListAccessRequestsDto,
    actor: Actor,
  ): Promise<InfinityPaginationResponseDto<AccessRequestResponseDto>> {
    const page = query.page || 1;
    const limit = query.limit || 20;

    let requests: AccessRequest[];
    if (actor.type === 'person') {
      requests = await this.domainService.listForPerson(actor.id);
    } else if (actor.type === 'issuer') {
      requests = await this.domainService.listForEntity(actor.id);
    } else {
      throw new ForbiddenException('Admins do not take part in access requests');
    }

    if (query.status) {
      requests = requests.filter((request) => request.status === query.status);
    }

    const skip = (page - 1) * limit;
    const data = requests
      .slice(skip, skip + limit)
      .map((request) => this.toResponseDto(request));

    return infinityPagination(data, { page, limit });
  }

  /**
   * Visible to the owner and to the requesting organization only
   */
  async getRequest(
    requestId: number,
    actor: Actor,
  ): Promise<AccessRequestResponseDto> {
    const request = await this.domainService.getById(requestId);

    const isOwner = actor.type === 'person' && request.ownerPersonId === actor.id;
    const isRequester =
      actor.type === 'issuer' && request.requesterEntityId === actor.id;
    if (!isOwner && !isRequester) {
      this.auditService.logDisclosureEvent({
        actorType: actor.type,
        actorId: actor.id,
        event: DisclosureEventType.ACCESS_REQUEST_VIEW_DENIED,
        success: false,
        metadata: { requestId },
      });
      throw new AccessRequestValidationError(
        AccessRequestErrorCode.FORBIDDEN,
        'Not authorized to view this access request',
      );
    }

    return this.toResponseDto(request);
  }

  async decide(
    requestId: number,
    dto: DecideAccessRequestDto,
    actor: Actor,
    signal?: AbortSignal,
  ): Promise<AccessRequestResponseDto> {
    this.requireActorType(actor, 'person');
    const request = await this.domainService.decide(
      requestId,
      actor.id,
      dto.approve,
      dto.note,
      signal,
    );
    return this.toResponseDto(request);
  }

  async openApprovedDocument(
    requestId: number,
    personDocumentId: number,
    actor: Actor,
    signal?: AbortSignal,
  ): Promise<StoredFileHandle> {
    this.requireActorType(actor, 'issuer');
    return this.domainService.loadApprovedResource(
      actor.id,
      requestId,
      personDocumentId,
      signal,
    );
  }

  async getDocumentTrace(
    requestId: number,
    personDocumentId: number,
    actor: Actor,
    signal?: AbortSignal,
  ): Promise<LedgerTraceResponseDto> {
    this.requireActorType(actor, 'issuer');
    const trace = await this.domainService.loadApprovedDocumentTrace(
      actor.id,
      requestId,
      personDocumentId,
      signal,
    );
    return plainToClass(LedgerTraceResponseDto, trace, {
      excludeExtraneousValues: true,
    });
  }

  private requireActorType(actor: Actor, type: ActorType): void {
    if (actor.type !== type) {
      throw new ForbiddenException(`Only ${type} accounts can do this`);
    }
  }

  private toResponseDto(request: AccessRequest): AccessRequestResponseDto {
    return plainToClass(AccessRequestResponseDto, request, {
      excludeExtraneousValues: true,
    });
  }
}
