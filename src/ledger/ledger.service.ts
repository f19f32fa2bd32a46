import { BadRequestException, Injectable } from '@nestjs/common';
import { plainToClass } from 'class-transformer';
import { LedgerSyncPort } from './domain/ports/ledger-sync.port';
import { CredentialIssuancePort } from './domain/ports/credential-issuance.port';
import { SyncLedgerDto } from './dto/sync-ledger.dto';
import { ToolRunResponseDto } from './dto/tool-run-response.dto';
import { ToolRunResult } from '../external-tools/utils/tool-output.util';
import { AuditService, DisclosureEventType } from '../audit/audit.service';
import { Actor } from '../auth/types/actor.type';

const MAX_OUTPUT_LENGTH = 4000;

/**
 * Ledger Service (Application Layer)
 *
 * Operator entry points for the ledger and credential network tools.
 */
@Injectable()
export class LedgerService {
  constructor(
    private readonly ledgerSync: LedgerSyncPort,
    private readonly credentialIssuance: CredentialIssuancePort,
    private readonly auditService: AuditService,
  ) {}

  async sync(dto: SyncLedgerDto, actor: Actor): Promise<ToolRunResponseDto> {
    const { idType, idNumber } = dto;
    if (!!idType !== !!idNumber) {
      throw new BadRequestException(
        'idType and idNumber must be given together',
      );
    }

    const result =
      idType && idNumber
        ? await this.ledgerSync.syncIdentity({ idType, idNumber })
        : await this.ledgerSync.syncAll();

    this.auditService.logDisclosureEvent({
      actorType: actor.type,
      actorId: actor.id,
      event: result.ok
        ? DisclosureEventType.LEDGER_SYNC_COMPLETED
        : DisclosureEventType.LEDGER_SYNC_FAILED,
      success: result.ok,
      errorMessage: result.reason ?? undefined,
      metadata: { scope: idType ? 'person' : 'all', exitCode: result.exitCode },
    });

    return this.toResponseDto(result);
  }

  async issueCredentials(actor: Actor): Promise<ToolRunResponseDto> {
    const result = await this.credentialIssuance.issueCredentials();

    this.auditService.logDisclosureEvent({
      actorType: actor.type,
      actorId: actor.id,
      event: result.ok
        ? DisclosureEventType.CREDENTIAL_ISSUANCE_COMPLETED
        : DisclosureEventType.CREDENTIAL_ISSUANCE_FAILED,
      success: result.ok,
      errorMessage: result.reason ?? undefined,
      metadata: { exitCode: result.exitCode },
    });

    return this.toResponseDto(result);
  }

  private toResponseDto(result: ToolRunResult): ToolRunResponseDto {
    return plainToClass(
      ToolRunResponseDto,
      {
        ok: result.ok,
        exitCode: result.exitCode,
        reason: result.reason,
        timedOut: result.timedOut,
        durationMs: result.durationMs,
        output: result.stdout.substring(0, MAX_OUTPUT_LENGTH),
      },
      { excludeExtraneousValues: true },
    );
  }
}
