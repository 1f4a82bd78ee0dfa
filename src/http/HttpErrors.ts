import { isDocsServiceError, type ErrorKind } from '../domain/errors/DomainErrors.js';

export type HttpErrorKind = ErrorKind | 'BadRequest' | 'MethodNotAllowed' | 'Internal';

/** 錯誤回應 body：`{ error_kind, message }` */
export interface ErrorBody {
  error_kind: HttpErrorKind;
  message: string;
}

/** 邊界層自己產生的錯誤（路由不存在、query 不合法等），與 domain 錯誤分開 */
export class HttpError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly errorKind: HttpErrorKind,
    message: string,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export class HttpErrors {
  static badRequest(message: string) {
    return new HttpError(400, 'BadRequest', message);
  }

  static notFound(message = 'Not found') {
    return new HttpError(404, 'NotFound', message);
  }

  static methodNotAllowed(message = 'Method not allowed') {
    return new HttpError(405, 'MethodNotAllowed', message);
  }
}

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  NotFound: 404,
  Forbidden: 403,
  Unavailable: 503,
};

export function statusForKind(kind: ErrorKind): number {
  return STATUS_BY_KIND[kind];
}

/** 將任意錯誤對應成 HTTP status 與 body；非預期錯誤一律 500，不外洩內部訊息 */
export function toErrorResponse(err: unknown): { statusCode: number; body: ErrorBody; expected: boolean } {
  if (isDocsServiceError(err)) {
    return {
      statusCode: statusForKind(err.kind),
      body: { error_kind: err.kind, message: err.message },
      expected: true,
    };
  }
  if (err instanceof HttpError) {
    return {
      statusCode: err.statusCode,
      body: { error_kind: err.errorKind, message: err.message },
      expected: true,
    };
  }
  return {
    statusCode: 500,
    body: { error_kind: 'Internal', message: 'Internal server error' },
    expected: false,
  };
}
