import { CanActivate, ExecutionContext, Injectable, ForbiddenException } from '@nestjs/common';
import { Role } from '../../user/enums/role.enum';
import { AuthenticatedRequest } from '../../auth/request-user';

const firstValue = (value: unknown): string | null => {
  if (Array.isArray(value)) return firstValue(value[0]);
  return typeof value === 'string' && value.length > 0 ? value : null;
};

@Injectable()
export class TenantGuard implements CanActivate {
  canActivate(context: ExecutionContext): boolean {
    const req = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const user = req.user;
    if (!user) return false;

    if (user.role === Role.SUPER_ADMIN) {
      const chosen =
        firstValue(req.params?.schoolId) ??
        firstValue(req.headers['x-school-id']) ??
        firstValue(req.query?.schoolId);
      req.schoolId = chosen; // can be null for global operations
      return true;
    }

    if (!user.schoolId) {
      throw new ForbiddenException('User not assigned to a school');
    }
    req.schoolId = user.schoolId;
    return true;
  }
}
