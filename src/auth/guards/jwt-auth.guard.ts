import { Injectable, UnauthorizedException } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { Logger } from '../../common/interceptors/logging.interceptor';
import { RequestUser } from '../request-user';

@Injectable()
export class JwtAuthGuard extends AuthGuard('jwt') {
  handleRequest<TUser = RequestUser>(err: unknown, user: TUser | false, info: unknown): TUser {
    if (err || !user) {
      const reason = err instanceof Error ? err.message : info instanceof Error ? info.message : 'No user found';
      Logger.warn(`Authentication failed: ${reason}`, 'JwtAuthGuard');
      throw err instanceof Error ? err : new UnauthorizedException();
    }
    return user;
  }
}
