import { UnauthorizedException } from '@nestjs/common';
import { Request } from 'express';
import { RoleEnum } from '../../roles/roles.enum';
import { Actor } from '../types/actor.type';
import { JwtPayloadType } from '../strategies/types/jwt-payload.type';

/**
 * Extract actor from request
 *
 * Actor type is determined by role:
 * - RoleEnum.admin (1) → 'admin', id = user id
 * - RoleEnum.person (2) → 'person', id = personId claim
 * - RoleEnum.issuer (3) → 'issuer', id = issuerId claim
 */
export function extractActorFromRequest(
  req: Request & { user?: JwtPayloadType },
): Actor {
  const user = req.user;
  if (!user?.id || !user.role?.id) {
    throw new UnauthorizedException('User ID or role ID not found in request');
  }

  switch (user.role.id) {
    case RoleEnum.admin:
      return { type: 'admin', id: Number(user.id) };
    case RoleEnum.person:
      if (!user.personId) {
        throw new UnauthorizedException('Token does not name a person');
      }
      return { type: 'person', id: user.personId };
    case RoleEnum.issuer:
      if (!user.issuerId) {
        throw new UnauthorizedException('Token does not name an issuer');
      }
      return { type: 'issuer', id: user.issuerId };
    default:
      throw new UnauthorizedException('Unknown role');
  }
}
