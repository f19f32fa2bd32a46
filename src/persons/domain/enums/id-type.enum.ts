/**
 * National identification document types.
 *
 * The ledger keys a person's records by (idType, idNumber), so these
 * values travel verbatim to the ledger tools.
 */
export enum IdType {
  CC = 'CC',
  CE = 'CE',
  PA = 'PA',
  NIT = 'NIT',
  TI = 'TI',
  PEP = 'PEP',
  OTHER = 'OTRO',
}
