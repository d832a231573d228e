import { Injectable, UnauthorizedException } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { ConfigService } from '../config/config.service';
import { isRole } from '../user/enums/role.enum';
import { RequestUser } from './request-user';

export interface JwtPayload {
  sub: string;
  role: string;
  schoolId?: string | null;
  username?: string;
  email?: string | null;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

/**
 * Tokens are issued by the school administration service; the payload is
 * trusted once the signature checks out, so no user lookup happens here.
 */
export function toRequestUser(payload: unknown): RequestUser {
  if (!isRecord(payload) || typeof payload.sub !== 'string' || !isRole(payload.role)) {
    throw new UnauthorizedException('Invalid token');
  }
  const schoolId = typeof payload.schoolId === 'string' && payload.schoolId ? payload.schoolId : null;
  return {
    id: payload.sub,
    role: payload.role,
    schoolId,
    username: typeof payload.username === 'string' ? payload.username : undefined,
    email: typeof payload.email === 'string' ? payload.email : null,
  };
}

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(configService: ConfigService) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: configService.get('JWT_SECRET'),
    });
  }

  validate(payload: unknown): RequestUser {
    return toRequestUser(payload);
  }
}
