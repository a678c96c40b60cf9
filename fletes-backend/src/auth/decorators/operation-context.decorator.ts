import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { DispatchErrorCode } from '@fletes/shared';
import { authorizationError } from '../../common/dispatch-errors';
import { OperationContext } from '../../common/operation-context';
import { DispatchRequest } from '../dispatch-request';

/**
 * Operation Context Decorator
 * Hands the context built by ActingUserGuard to a handler.
 *
 * @example
 * async confirm(@Operation() ctx: OperationContext, @Param('id') id: string) {
 *   return this.workflow.confirmPreauthorized(id, undefined, ctx);
 * }
 */
export const Operation = createParamDecorator((_data: unknown, ctx: ExecutionContext): OperationContext => {
  const request = ctx.switchToHttp().getRequest<DispatchRequest>();
  if (!request.operationContext) {
    throw authorizationError({
      code: DispatchErrorCode.UserNotFound,
      message: 'No se identificó el usuario que realiza la operación',
    });
  }
  return request.operationContext;
});
