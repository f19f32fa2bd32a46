import { RoleEnum } from '../../../roles/roles.enum';

export type JwtPayloadType = {
  id: number | string;
  role: { id: RoleEnum };
  /** Person the principal acts for (role: person) */
  personId?: number;
  /** Issuing entity the principal acts for (role: issuer) */
  issuerId?: number;
  iat: number;
  exp: number;
};
