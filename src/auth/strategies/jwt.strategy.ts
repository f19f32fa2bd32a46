import { ExtractJwt, Strategy } from 'passport-jwt';
import { Injectable, UnauthorizedException } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { ConfigService } from '@nestjs/config';
import { JwtPayloadType } from './types/jwt-payload.type';
import { AllConfigType } from '../../config/config.type';
import { RoleEnum } from '../../roles/roles.enum';

const KNOWN_ROLES: number[] = [RoleEnum.admin, RoleEnum.person, RoleEnum.issuer];

type RawJwtPayload = {
  sub?: number | string;
  id?: number | string;
  role?: { id?: number };
  personId?: number;
  issuerId?: number;
  iat?: number;
  exp?: number;
};

/**
 * Validates bearer tokens issued by the identity service.
 *
 * Tokens are not issued here; this strategy only checks the signature
 * and that the payload names a known role.
 */
@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy, 'jwt') {
  constructor(configService: ConfigService<AllConfigType>) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      secretOrKey: configService.getOrThrow('auth.secret', { infer: true }),
      issuer: configService.get('auth.jwtIssuer', { infer: true }),
      audience: configService.get('auth.jwtAudience', { infer: true }),
    });
  }

  public validate(payload: RawJwtPayload): JwtPayloadType {
    const userId = payload.sub ?? payload.id;
    const roleId = payload.role?.id;

    if (!userId || !roleId || !KNOWN_ROLES.includes(roleId)) {
      throw new UnauthorizedException();
    }

    return {
      id: userId,
      role: { id: roleId },
      personId: payload.personId,
      issuerId: payload.issuerId,
      iat: payload.iat ?? 0,
      exp: payload.exp ?? 0,
    };
  }
}
