import { BadRequestException, createParamDecorator, ExecutionContext } from '@nestjs/common';
import { AuthenticatedRequest } from '../../auth/request-user';
import { Role } from '../../user/enums/role.enum';

export interface TenantContext {
  userId: string;
  role: Role;
  schoolId: string | null;
}

/**
 * Who is acting and for which school. Every ledger operation takes one of these
 * explicitly instead of reading the request.
 */
export interface ActorContext {
  userId: string;
  role: Role;
  schoolId: string;
}

export function resolveTenant(request: AuthenticatedRequest): TenantContext {
  const user = request.user;
  if (!user) {
    throw new BadRequestException('Authenticated user required');
  }
  return {
    userId: user.id,
    role: user.role,
    schoolId: request.schoolId ?? user.schoolId ?? null,
  };
}

export function requireActor(tenant: TenantContext): ActorContext {
  if (!tenant.schoolId) {
    throw new BadRequestException('School context required (super admins pass x-school-id)');
  }
  return { userId: tenant.userId, role: tenant.role, schoolId: tenant.schoolId };
}

export const SchoolContext = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): ActorContext =>
    requireActor(resolveTenant(ctx.switchToHttp().getRequest<AuthenticatedRequest>())),
);
