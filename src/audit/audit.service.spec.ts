import { ConfigService } from '@nestjs/config';
import { AuditService, DisclosureEventType } from './audit.service';
import { AllConfigType } from '../config/config.type';

describe('AuditService', () => {
  let service: AuditService;
  let infoSpy: jest.SpyInstance;

  beforeEach(() => {
    const configService = {
      get: jest.fn().mockReturnValue('test'),
    } as unknown as ConfigService<AllConfigType>;
    service = new AuditService(configService);
    infoSpy = jest.spyOn(console, 'info').mockImplementation(() => undefined);
  });

  afterEach(() => {
    infoSpy.mockRestore();
  });

  const loggedEntry = (): Record<string, unknown> =>
    JSON.parse(String(infoSpy.mock.calls[0][0]));

  it('should write one JSON line per event', () => {
    service.logDisclosureEvent({
      actorType: 'person',
      actorId: 7,
      event: DisclosureEventType.ACCESS_REQUEST_APPROVED,
      success: true,
      metadata: { requestId: 11 },
    });

    expect(infoSpy).toHaveBeenCalledTimes(1);
    expect(loggedEntry()).toEqual({
      timestamp: expect.any(String),
      service: 'disclosure-ledger-api',
      component: 'disclosure',
      actorType: 'person',
      actorId: 7,
      event: 'ACCESS_REQUEST_APPROVED',
      success: true,
      environment: 'test',
      metadata: { requestId: 11 },
    });
  });

  it('should redact identity numbers, emails and tokens from error messages', () => {
    service.logDisclosureEvent({
      actorType: 'system',
      actorId: 'ledger',
      event: DisclosureEventType.LEDGER_SYNC_FAILED,
      success: false,
      errorMessage:
        'identity CC 1020304050 of ana@example.com rejected, Bearer abc.def',
    });

    expect(loggedEntry().errorType).toBe(
      'identity CC [NUMBER_REDACTED] of [EMAIL_REDACTED] rejected, Bearer [TOKEN_REDACTED]',
    );
  });
});
