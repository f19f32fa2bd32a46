import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';
import { ActorType } from '../auth/types/actor.type';

export interface DisclosureEventData {
  actorType: ActorType | 'system';
  actorId: number | string;
  event: DisclosureEventType;
  success: boolean;
  errorMessage?: string;
  metadata?: Record<string, string | number | boolean | null>; // ids and statuses only
}

export enum DisclosureEventType {
  ACCESS_REQUEST_CREATED = 'ACCESS_REQUEST_CREATED',
  ACCESS_REQUEST_APPROVED = 'ACCESS_REQUEST_APPROVED',
  ACCESS_REQUEST_REJECTED = 'ACCESS_REQUEST_REJECTED',
  ACCESS_REQUEST_EXPIRED = 'ACCESS_REQUEST_EXPIRED',
  ACCESS_REQUEST_DECISION_UNAUTHORIZED = 'ACCESS_REQUEST_DECISION_UNAUTHORIZED',
  ACCESS_REQUEST_VIEW_DENIED = 'ACCESS_REQUEST_VIEW_DENIED',
  // Retrieval of approved documents by the requesting organization
  APPROVED_RESOURCE_ACCESSED = 'APPROVED_RESOURCE_ACCESSED',
  APPROVED_RESOURCE_DENIED = 'APPROVED_RESOURCE_DENIED',
  APPROVED_TRACE_VIEWED = 'APPROVED_TRACE_VIEWED',
  // Ledger and credential network tooling
  LEDGER_SYNC_COMPLETED = 'LEDGER_SYNC_COMPLETED',
  LEDGER_SYNC_FAILED = 'LEDGER_SYNC_FAILED',
  LEDGER_VALIDATION_FAILED = 'LEDGER_VALIDATION_FAILED',
  CREDENTIAL_ISSUANCE_COMPLETED = 'CREDENTIAL_ISSUANCE_COMPLETED',
  CREDENTIAL_ISSUANCE_FAILED = 'CREDENTIAL_ISSUANCE_FAILED',
}

/**
 * Audit Service for disclosure events
 *
 * Every consent decision and every release of a document to an
 * organization is written as one structured JSON line.
 *
 * Security Notes:
 * - Never log identity numbers, names, purposes or file paths
 * - Only ids, event type, outcome and a sanitized error summary
 */
@Injectable()
export class AuditService {
  constructor(private configService: ConfigService<AllConfigType>) {}

  logDisclosureEvent(data: DisclosureEventData): void {
    const logEntry = {
      timestamp: new Date().toISOString(),
      service: 'disclosure-ledger-api',
      component: 'disclosure',
      actorType: data.actorType,
      actorId: data.actorId,
      event: data.event,
      success: data.success,
      errorType: data.errorMessage
        ? this.sanitizeErrorMessage(data.errorMessage)
        : undefined,
      environment: this.configService.get('app.nodeEnv', { infer: true }),
      ...(data.metadata ? { metadata: data.metadata } : {}),
    };

    // Structured JSON logging, one line per event
    console.info(JSON.stringify(logEntry));
  }

  /**
   * Sanitize error messages to prevent logging of sensitive data
   */
  private sanitizeErrorMessage(error: string): string {
    return error
      .replace(
        /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,
        '[EMAIL_REDACTED]',
      )
      .replace(/Bearer\s+[^\s]+/gi, 'Bearer [TOKEN_REDACTED]')
      .replace(/\b\d{6,}\b/g, '[NUMBER_REDACTED]')
      .substring(0, 500);
  }
}
