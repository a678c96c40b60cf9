import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { ConfigService } from '../../config/config.service';
import { UsersService } from '../../users/users.service';
import { ACTING_USER_HEADER, DispatchRequest } from '../dispatch-request';

/**
 * Acting User Guard
 * Resolves the user named by the `x-usuario` header against the user
 * directory and attaches the operation context (actor plus request deadline).
 */
@Injectable()
export class ActingUserGuard implements CanActivate {
  constructor(
    private readonly usersService: UsersService,
    private readonly configService: ConfigService,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<DispatchRequest>();
    const header = request.headers[ACTING_USER_HEADER];
    const username = Array.isArray(header) ? header[0] : header;

    const signal = AbortSignal.timeout(this.configService.requestDeadlineMs);
    const actor = await this.usersService.getActingUser(username, signal);

    request.operationContext = { actor, signal };
    return true;
  }
}
