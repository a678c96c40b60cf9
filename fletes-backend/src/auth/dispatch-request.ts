import { Request } from 'express';
import { OperationContext } from '../common/operation-context';

/** Header naming the acting user on every dispatch request */
export const ACTING_USER_HEADER = 'x-usuario';

export interface DispatchRequest extends Request {
  operationContext?: OperationContext;
}
