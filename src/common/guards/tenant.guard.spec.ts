import { ExecutionContext, ForbiddenException } from '@nestjs/common';
import { TenantGuard } from './tenant.guard';
import { AuthenticatedRequest } from '../../auth/request-user';
import { Role } from '../../user/enums/role.enum';
import { requireActor, resolveTenant } from '../decorators/school.decorator';

const contextFor = (req: AuthenticatedRequest): ExecutionContext =>
  ({
    switchToHttp: () => ({ getRequest: () => req }),
  }) as unknown as ExecutionContext;

describe('TenantGuard', () => {
  const guard = new TenantGuard();

  it('pins regular users to their own school', () => {
    const req: AuthenticatedRequest = {
      user: { id: 'u1', role: Role.FINANCE, schoolId: 'school-1' },
      headers: { 'x-school-id': 'school-2' },
    };
    expect(guard.canActivate(contextFor(req))).toBe(true);
    expect(req.schoolId).toBe('school-1');
    expect(requireActor(resolveTenant(req))).toEqual({ userId: 'u1', role: Role.FINANCE, schoolId: 'school-1' });
  });

  it('lets super admins choose a school through the header', () => {
    const req: AuthenticatedRequest = {
      user: { id: 'root', role: Role.SUPER_ADMIN, schoolId: null },
      headers: { 'x-school-id': 'school-9' },
      query: {},
    };
    expect(guard.canActivate(contextFor(req))).toBe(true);
    expect(req.schoolId).toBe('school-9');
  });

  it('rejects users without a school', () => {
    const req: AuthenticatedRequest = {
      user: { id: 'u2', role: Role.ADMIN, schoolId: null },
      headers: {},
    };
    expect(() => guard.canActivate(contextFor(req))).toThrow(ForbiddenException);
  });

  it('requires a school before building an actor', () => {
    expect(() => requireActor({ userId: 'root', role: Role.SUPER_ADMIN, schoolId: null })).toThrow(
      'School context required (super admins pass x-school-id)',
    );
  });
});
