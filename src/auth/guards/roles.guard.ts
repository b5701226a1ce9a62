import {
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Injectable,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { hasRole } from '../auth-user';
import { ROLES_KEY } from '../decorators/roles.decorator';
import { Role } from '../role.enum';
import { AuthenticatedRequest } from './jwt-auth.guard';

/**
 * Runs after JwtAuthGuard. A user passes when they hold any of the roles
 * listed with @Roles(); Admin passes every check.
 */
@Injectable()
export class RolesGuard implements CanActivate {
  constructor(private readonly reflector: Reflector) {}

  canActivate(context: ExecutionContext): boolean {
    const required = this.reflector.getAllAndOverride<Role[] | undefined>(
      ROLES_KEY,
      [context.getHandler(), context.getClass()],
    );

    if (!required || required.length === 0) {
      return true;
    }

    const { user } = context.switchToHttp().getRequest<AuthenticatedRequest>();
    if (user && required.some((role) => hasRole(user, role))) {
      return true;
    }

    throw new ForbiddenException(`Requires role: ${required.join(' or ')}`);
  }
}
