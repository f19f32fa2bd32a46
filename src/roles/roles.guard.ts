import { Injectable, CanActivate, ExecutionContext } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { Request } from 'express';
import { RoleEnum } from './roles.enum';
import { JwtPayloadType } from '../auth/strategies/types/jwt-payload.type';

@Injectable()
export class RolesGuard implements CanActivate {
  constructor(private reflector: Reflector) {}

  canActivate(context: ExecutionContext): boolean {
    const roles = this.reflector.getAllAndOverride<RoleEnum[] | undefined>(
      'roles',
      [context.getClass(), context.getHandler()],
    );
    if (!roles || !roles.length) {
      return true;
    }
    const request = context
      .switchToHttp()
      .getRequest<Request & { user?: JwtPayloadType }>();

    const userRoleId = request.user?.role?.id;
    if (!userRoleId) {
      return false;
    }

    return roles.includes(userRoleId);
  }
}
