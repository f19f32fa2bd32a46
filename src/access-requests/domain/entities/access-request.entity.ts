import { AccessRequestStatus } from '../enums/access-request-status.enum';

/**
 * Days a pending request stays decidable after creation.
 */
export const ACCESS_REQUEST_GRACE_PERIOD_DAYS = 15;

export const MAX_PURPOSE_LENGTH = 300;
export const MAX_DECISION_NOTE_LENGTH = 300;

/**
 * Domain entity for AccessRequest
 *
 * An organization's request to see specific documents of one person.
 *
 * Workflow States:
 * - pending: awaiting the owner's decision
 * - approved: owner consented and every item was confirmed on the ledger
 * - rejected: owner declined
 * - expired: a decision was attempted after expiresAt
 *
 * decidedAt is set exactly when status leaves pending, and items never
 * change after creation.
 */
export interface AccessRequest {
  id: number;
  requesterEntityId: number;
  ownerPersonId: number;
  purpose: string;
  status: AccessRequestStatus;
  requestedAt: Date;
  decidedAt: Date | null;
  expiresAt: Date;
  decisionNote: string | null;
  items: AccessRequestItem[];
}

export interface AccessRequestItem {
  id: number;
  accessRequestId: number;
  personDocumentId: number;
  documentTitle: string | null; // display only
}
