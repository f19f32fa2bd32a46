/**
 * Review outcome of a person document.
 * Only APPROVED documents may be requested or disclosed.
 */
export enum ReviewStatus {
  PENDING = 'pending',
  APPROVED = 'approved',
  REJECTED = 'rejected',
}
