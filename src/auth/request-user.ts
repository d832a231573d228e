import { Role } from '../user/enums/role.enum';

export interface RequestUser {
  id: string;
  role: Role;
  schoolId: string | null;
  username?: string;
  email?: string | null;
}

/** The parts of an Express request the guards and decorators read. */
export interface AuthenticatedRequest {
  user?: RequestUser;
  schoolId?: string | null;
  params?: Record<string, string | undefined>;
  query?: Record<string, unknown>;
  headers: Record<string, string | string[] | undefined>;
}
