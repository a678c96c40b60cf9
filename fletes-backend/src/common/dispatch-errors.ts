import {
  BadGatewayException,
  BadRequestException,
  ConflictException,
  ForbiddenException,
  HttpException,
  NotFoundException,
} from '@nestjs/common';
import {
  DispatchErrorCode,
  DispatchErrorContext,
  DispatchErrorKind,
  DispatchErrorPayload,
} from '@fletes/shared';

const EXCEPTION_BY_KIND: Record<DispatchErrorKind, new (body: DispatchErrorPayload) => HttpException> = {
  [DispatchErrorKind.Validation]: BadRequestException,
  [DispatchErrorKind.Authorization]: ForbiddenException,
  [DispatchErrorKind.State]: ConflictException,
  [DispatchErrorKind.NotFound]: NotFoundException,
  [DispatchErrorKind.External]: BadGatewayException,
};

export interface DispatchErrorInit {
  code: DispatchErrorCode;
  message: string;
  context?: DispatchErrorContext;
  /** Region of the acting user; operators read messages prefixed by it */
  region?: string;
}

export function dispatchException(kind: DispatchErrorKind, init: DispatchErrorInit): HttpException {
  const prefix = init.region ? `[${init.region}] ` : '';
  const payload: DispatchErrorPayload = {
    kind,
    code: init.code,
    message: `${prefix}${init.message}`,
    context: init.context ?? {},
  };
  return new EXCEPTION_BY_KIND[kind](payload);
}

export const validationError = (init: DispatchErrorInit) =>
  dispatchException(DispatchErrorKind.Validation, init);

export const authorizationError = (init: DispatchErrorInit) =>
  dispatchException(DispatchErrorKind.Authorization, init);

export const stateError = (init: DispatchErrorInit) =>
  dispatchException(DispatchErrorKind.State, init);

export const notFoundError = (init: DispatchErrorInit) =>
  dispatchException(DispatchErrorKind.NotFound, init);

export const externalError = (init: DispatchErrorInit) =>
  dispatchException(DispatchErrorKind.External, init);

export function isDispatchErrorPayload(value: unknown): value is DispatchErrorPayload {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const kinds: string[] = Object.values(DispatchErrorKind);
  return 'kind' in value && typeof value.kind === 'string' && kinds.includes(value.kind) && 'code' in value;
}

/** Structured payload of an engine error, if the error is one */
export function dispatchPayloadOf(error: unknown): DispatchErrorPayload | undefined {
  if (!(error instanceof HttpException)) {
    return undefined;
  }
  const body = error.getResponse();
  return isDispatchErrorPayload(body) ? body : undefined;
}

export function errorMessage(error: unknown): string {
  const payload = dispatchPayloadOf(error);
  if (payload) {
    return payload.message;
  }
  return error instanceof Error ? error.message : String(error);
}

/** AWS SDK errors identify themselves by name */
export function awsErrorName(error: unknown): string | undefined {
  return error instanceof Error ? error.name : undefined;
}
