import { ForbiddenException } from '@nestjs/common';
import { AccessRequestsService } from './access-requests.service';
import { AccessRequestDomainService } from './domain/services/access-request.domain.service';
import { AccessRequest } from './domain/entities/access-request.entity';
import { AccessRequestStatus } from './domain/enums/access-request-status.enum';
import { AccessRequestErrorCode } from './domain/errors/access-request.errors';
import { AccessRequestResponseDto } from './dto/access-request-response.dto';
import { LedgerTraceResponseDto } from './dto/ledger-trace-response.dto';
import { AuditService, DisclosureEventType } from '../audit/audit.service';
import { Actor } from '../auth/types/actor.type';

const person: Actor = { type: 'person', id: 7 };
const issuer: Actor = { type: 'issuer', id: 3 };
const admin: Actor = { type: 'admin', id: 1 };

const buildRequest = (id: number, status: AccessRequestStatus): AccessRequest => ({
  id,
  requesterEntityId: 3,
  ownerPersonId: 7,
  purpose: 'Tenant screening',
  status,
  requestedAt: new Date('2025-01-20T10:00:00.000Z'),
  decidedAt:
    status === AccessRequestStatus.PENDING
      ? null
      : new Date('2025-01-21T10:00:00.000Z'),
  expiresAt: new Date('2025-02-04T10:00:00.000Z'),
  decisionNote: null,
  items: [
    { id: id * 10, accessRequestId: id, personDocumentId: 55, documentTitle: 'Diploma' },
  ],
});

describe('AccessRequestsService', () => {
  let service: AccessRequestsService;
  let mockDomainService: jest.Mocked<AccessRequestDomainService>;
  let mockAudit: jest.Mocked<AuditService>;

  beforeEach(() => {
    mockDomainService = {
      createRequest: jest.fn(),
      listForPerson: jest.fn(),
      listForEntity: jest.fn(),
      getById: jest.fn(),
      decide: jest.fn(),
      loadApprovedResource: jest.fn(),
      loadApprovedDocumentTrace: jest.fn(),
    } as unknown as jest.Mocked<AccessRequestDomainService>;
    mockAudit = {
      logDisclosureEvent: jest.fn(),
    } as unknown as jest.Mocked<AuditService>;

    service = new AccessRequestsService(mockDomainService, mockAudit);
  });

  describe('createRequest', () => {
    it('should create on behalf of the calling organization', async () => {
      mockDomainService.createRequest.mockResolvedValue(
        buildRequest(11, AccessRequestStatus.PENDING),
      );

      const result = await service.createRequest(
        { personId: 7, purpose: 'Tenant screening', personDocumentIds: [55] },
        issuer,
      );

      expect(mockDomainService.createRequest).toHaveBeenCalledWith(
        3,
        7,
        'Tenant screening',
        [55],
      );
      expect(result).toBeInstanceOf(AccessRequestResponseDto);
      expect(result.items[0].documentTitle).toBe('Diploma');
    });

    it('should refuse persons', async () => {
      await expect(
        service.createRequest(
          { personId: 7, purpose: 'x', personDocumentIds: [55] },
          person,
        ),
      ).rejects.toThrow(new ForbiddenException('Only issuer accounts can do this'));
      expect(mockDomainService.createRequest).not.toHaveBeenCalled();
    });
  });

  describe('listRequests', () => {
    it("should list the person's requests filtered by status", async () => {
      mockDomainService.listForPerson.mockResolvedValue([
        buildRequest(13, AccessRequestStatus.PENDING),
        buildRequest(12, AccessRequestStatus.APPROVED),
        buildRequest(11, AccessRequestStatus.PENDING),
      ]);

      const result = await service.listRequests(
        { status: AccessRequestStatus.PENDING },
        person,
      );

      expect(mockDomainService.listForPerson).toHaveBeenCalledWith(7);
      expect(result.data.map((request) => request.id)).toEqual([13, 11]);
      expect(result.hasNextPage).toBe(false);
    });

    it("should page through the organization's requests", async () => {
      mockDomainService.listForEntity.mockResolvedValue([
        buildRequest(13, AccessRequestStatus.PENDING),
        buildRequest(12, AccessRequestStatus.APPROVED),
        buildRequest(11, AccessRequestStatus.REJECTED),
      ]);

      const result = await service.listRequests({ page: 2, limit: 1 }, issuer);

      expect(mockDomainService.listForEntity).toHaveBeenCalledWith(3);
      expect(result.data.map((request) => request.id)).toEqual([12]);
      expect(result.hasNextPage).toBe(true);
    });

    it('should refuse admins', async () => {
      await expect(service.listRequests({}, admin)).rejects.toBeInstanceOf(
        ForbiddenException,
      );
    });
  });

  describe('getRequest', () => {
    beforeEach(() => {
      mockDomainService.getById.mockResolvedValue(
        buildRequest(11, AccessRequestStatus.PENDING),
      );
    });

    it('should show the request to its owner and its requester', async () => {
      await expect(service.getRequest(11, person)).resolves.toMatchObject({ id: 11 });
      await expect(service.getRequest(11, issuer)).resolves.toMatchObject({ id: 11 });
    });

    it('should hide the request from other organizations', async () => {
      await expect(
        service.getRequest(11, { type: 'issuer', id: 4 }),
      ).rejects.toMatchObject({
        code: AccessRequestErrorCode.FORBIDDEN,
        message: 'Not authorized to view this access request',
      });
      expect(mockAudit.logDisclosureEvent).toHaveBeenCalledWith({
        actorType: 'issuer',
        actorId: 4,
        event: DisclosureEventType.ACCESS_REQUEST_VIEW_DENIED,
        success: false,
        metadata: { requestId: 11 },
      });
    });

    it('should hide the request from a person sharing the requester id', async () => {
      await expect(
        service.getRequest(11, { type: 'person', id: 3 }),
      ).rejects.toMatchObject({ code: AccessRequestErrorCode.FORBIDDEN });
    });
  });

  describe('decide', () => {
    it('should decide as the calling person', async () => {
      mockDomainService.decide.mockResolvedValue(
        buildRequest(11, AccessRequestStatus.REJECTED),
      );
      const controller = new AbortController();

      const result = await service.decide(
        11,
        { approve: false, note: 'No' },
        person,
        controller.signal,
      );

      expect(mockDomainService.decide).toHaveBeenCalledWith(
        11,
        7,
        false,
        'No',
        controller.signal,
      );
      expect(result.status).toBe(AccessRequestStatus.REJECTED);
    });

    it('should refuse organizations', async () => {
      await expect(
        service.decide(11, { approve: true }, issuer),
      ).rejects.toBeInstanceOf(ForbiddenException);
    });
  });

  describe('getDocumentTrace', () => {
    it('should return the trace as a response DTO', async () => {
      mockDomainService.loadApprovedDocumentTrace.mockResolvedValue({
        network: 'Hyperledger Fabric',
        blockReference: 'tx-abc',
        title: 'Diploma',
        issuingEntity: 'University',
        status: 'Registered',
        createdAt: '2025-01-18 08:30 UTC',
        size: '2.00 KB',
        fileName: 'diploma.pdf',
        filePath: '/srv/storage/diploma.pdf',
      });

      const trace = await service.getDocumentTrace(11, 55, issuer);

      expect(mockDomainService.loadApprovedDocumentTrace).toHaveBeenCalledWith(
        3,
        11,
        55,
        undefined,
      );
      expect(trace).toBeInstanceOf(LedgerTraceResponseDto);
      expect(trace.blockReference).toBe('tx-abc');
      expect(trace.size).toBe('2.00 KB');
    });
  });
});
