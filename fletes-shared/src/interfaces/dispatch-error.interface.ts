import { DispatchErrorCode, DispatchErrorKind } from '../enums/dispatch-error.enum';

export interface RowError {
  row: number;
  message: string;
}

export interface DispatchErrorContext {
  bundleId?: string;
  bundleIds?: string[];
  lineId?: string;
  integraConsecutive?: string;
  row?: number;
  errors?: RowError[];
  [key: string]: unknown;
}

/** Body of every error the engine returns to a caller */
export interface DispatchErrorPayload {
  kind: DispatchErrorKind;
  code: DispatchErrorCode;
  message: string;
  context: DispatchErrorContext;
}
