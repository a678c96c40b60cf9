import { DispatchErrorCode, DispatchUser } from '@fletes/shared';
import { stateError } from './dispatch-errors';

/**
 * Per-request state threaded through every engine call. The signal carries
 * the caller's deadline down to each store round trip.
 */
export interface OperationContext {
  actor: DispatchUser;
  signal?: AbortSignal;
}

export function sendOptions(ctx?: Pick<OperationContext, 'signal'>): { abortSignal?: AbortSignal } {
  return ctx?.signal ? { abortSignal: ctx.signal } : {};
}

/** Aborted requests must not start a write */
export function assertNotCancelled(ctx: Pick<OperationContext, 'signal'> | undefined, bundleId?: string): void {
  if (ctx?.signal?.aborted) {
    throw stateError({
      code: DispatchErrorCode.RequestCancelled,
      message: 'La solicitud fue cancelada o excedió el tiempo límite antes de guardar los cambios',
      context: bundleId ? { bundleId } : {},
    });
  }
}
