import { CanActivate, ExecutionContext, Injectable, Logger } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { IS_PUBLIC_KEY } from '../decorators/public.decorator';
import { ROLES_KEY } from '../decorators/roles.decorator';
import { UserRole } from '../enums/user-role.enum';
import { NotAuthorizedException } from '../exceptions/dispatch.exception';
import { AuthenticatedRequest } from '../interfaces/authenticated-user.interface';
import { GatewayIdentityVerifier } from './gateway-identity.verifier';

@Injectable()
export class TrustedGatewayGuard implements CanActivate {
  private readonly logger = new Logger(TrustedGatewayGuard.name);

  constructor(
    private readonly reflector: Reflector,
    private readonly identityVerifier: GatewayIdentityVerifier,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const isPublic = this.reflector.getAllAndOverride<boolean | undefined>(IS_PUBLIC_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (isPublic) {
      return true;
    }

    const req = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const user = this.identityVerifier.resolve(req.headers);

    const requiredRoles = this.reflector.getAllAndOverride<UserRole[] | undefined>(ROLES_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (requiredRoles && requiredRoles.length > 0 && !requiredRoles.includes(user.role)) {
      this.logger.warn(`User ${user.userId} (${user.role}) lacks required roles: ${requiredRoles.join(', ')}`);
      throw new NotAuthorizedException('Insufficient permissions');
    }

    req.user = user;
    return true;
  }
}
