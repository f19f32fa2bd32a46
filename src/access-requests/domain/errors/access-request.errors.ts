import { HttpException, HttpStatus } from '@nestjs/common';

export enum AccessRequestErrorCode {
  INVALID_INPUT = 'INVALID_INPUT',
  NOT_FOUND = 'NOT_FOUND',
  FORBIDDEN = 'FORBIDDEN',
  NOT_DISCLOSABLE = 'NOT_DISCLOSABLE',
  ALREADY_DECIDED = 'ALREADY_DECIDED',
  EXPIRED = 'EXPIRED',
  NOT_APPROVED = 'NOT_APPROVED',
  OUT_OF_SCOPE = 'OUT_OF_SCOPE',
  NO_FILE = 'NO_FILE',
  LEDGER_SYNC_FAILED = 'LEDGER_SYNC_FAILED',
  LEDGER_UNAVAILABLE = 'LEDGER_UNAVAILABLE',
  LEDGER_UNMATCHED = 'LEDGER_UNMATCHED',
}

const HTTP_STATUS_BY_CODE: Record<AccessRequestErrorCode, HttpStatus> = {
  [AccessRequestErrorCode.INVALID_INPUT]: HttpStatus.BAD_REQUEST,
  [AccessRequestErrorCode.NOT_FOUND]: HttpStatus.NOT_FOUND,
  [AccessRequestErrorCode.FORBIDDEN]: HttpStatus.FORBIDDEN,
  [AccessRequestErrorCode.NOT_DISCLOSABLE]: HttpStatus.BAD_REQUEST,
  [AccessRequestErrorCode.ALREADY_DECIDED]: HttpStatus.CONFLICT,
  [AccessRequestErrorCode.EXPIRED]: HttpStatus.GONE,
  [AccessRequestErrorCode.NOT_APPROVED]: HttpStatus.CONFLICT,
  [AccessRequestErrorCode.OUT_OF_SCOPE]: HttpStatus.FORBIDDEN,
  [AccessRequestErrorCode.NO_FILE]: HttpStatus.UNPROCESSABLE_ENTITY,
  [AccessRequestErrorCode.LEDGER_SYNC_FAILED]: HttpStatus.SERVICE_UNAVAILABLE,
  [AccessRequestErrorCode.LEDGER_UNAVAILABLE]: HttpStatus.SERVICE_UNAVAILABLE,
  [AccessRequestErrorCode.LEDGER_UNMATCHED]: HttpStatus.UNPROCESSABLE_ENTITY,
};

/**
 * A caller-facing rule violation in the access-request workflow.
 *
 * Response body: { status, code, message }.
 */
export class AccessRequestValidationError extends HttpException {
  readonly code: AccessRequestErrorCode;

  constructor(code: AccessRequestErrorCode, message: string) {
    const status = HTTP_STATUS_BY_CODE[code];
    super({ status, code, message }, status);
    this.code = code;
    this.name = 'AccessRequestValidationError';
  }
}

/**
 * Stored data breaks an invariant the workflow relies on
 * (e.g. an item whose document no longer exists). Surfaces as HTTP 500.
 */
export class AccessRequestIntegrityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AccessRequestIntegrityError';

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, AccessRequestIntegrityError.prototype);
  }
}
