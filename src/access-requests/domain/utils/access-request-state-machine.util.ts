import { AccessRequestStatus } from '../enums/access-request-status.enum';
import { AccessRequest } from '../entities/access-request.entity';
import {
  AccessRequestErrorCode,
  AccessRequestValidationError,
} from '../errors/access-request.errors';

/**
 * Access Request State Machine Utility
 *
 * Valid Transitions:
 * - PENDING → APPROVED (owner, after ledger validation)
 * - PENDING → REJECTED (owner)
 * - PENDING → EXPIRED (decision attempted after expiresAt)
 *
 * APPROVED, REJECTED and EXPIRED are terminal.
 */
export class AccessRequestStateMachine {
  private static readonly VALID_TRANSITIONS: Map<
    AccessRequestStatus,
    AccessRequestStatus[]
  > = new Map([
    [
      AccessRequestStatus.PENDING,
      [
        AccessRequestStatus.APPROVED,
        AccessRequestStatus.REJECTED,
        AccessRequestStatus.EXPIRED,
      ],
    ],
  ]);

  static isValidTransition(
    fromStatus: AccessRequestStatus,
    toStatus: AccessRequestStatus,
  ): boolean {
    const validTargets = this.VALID_TRANSITIONS.get(fromStatus);
    if (!validTargets) {
      return false;
    }

    return validTargets.includes(toStatus);
  }

  /**
   * @throws AccessRequestValidationError (ALREADY_DECIDED) if the request has left pending
   */
  static validateTransition(
    fromStatus: AccessRequestStatus,
    toStatus: AccessRequestStatus,
  ): void {
    if (!this.isValidTransition(fromStatus, toStatus)) {
      throw new AccessRequestValidationError(
        AccessRequestErrorCode.ALREADY_DECIDED,
        `Access request has already been decided (${fromStatus})`,
      );
    }
  }

  static isTerminal(status: AccessRequestStatus): boolean {
    return !this.VALID_TRANSITIONS.has(status);
  }

  /**
   * Past its expiry instant. Expiry is strict: at exactly expiresAt the
   * request is still decidable.
   */
  static isExpired(request: Pick<AccessRequest, 'expiresAt'>, now: Date): boolean {
    return now.getTime() > request.expiresAt.getTime();
  }
}
