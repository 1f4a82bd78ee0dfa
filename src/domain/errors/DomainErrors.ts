export type ErrorKind = 'NotFound' | 'Forbidden' | 'Unavailable';

/** 所有 docshelf domain 錯誤的基底類別；kind 決定邊界層的 HTTP status */
export abstract class DocsServiceError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

export function isDocsServiceError(err: unknown): err is DocsServiceError {
  return err instanceof DocsServiceError;
}

// --- NotFound ---

export class DocumentNotFoundError extends DocsServiceError {
  readonly kind = 'NotFound' as const;
  readonly code = 'DOC_NOT_FOUND';

  constructor(
    public readonly requestedPath: string,
    options?: ErrorOptions,
  ) {
    super(`Documentation file not found: ${requestedPath}`, options);
  }
}

// --- Forbidden ---

export class PathForbiddenError extends DocsServiceError {
  readonly kind = 'Forbidden' as const;
  readonly code = 'PATH_FORBIDDEN';

  constructor(
    public readonly requestedPath: string,
    options?: ErrorOptions,
  ) {
    super(`Path escapes the docs root: ${requestedPath}`, options);
  }
}

// --- Unavailable ---

export class DocsRootUnavailableError extends DocsServiceError {
  readonly kind = 'Unavailable' as const;
  readonly code = 'DOCS_ROOT_UNAVAILABLE';

  constructor(
    public readonly rootDir: string,
    reason: string,
    options?: ErrorOptions,
  ) {
    super(`Docs root "${rootDir}" is unavailable: ${reason}`, options);
  }
}

export class DocumentReadError extends DocsServiceError {
  readonly kind = 'Unavailable' as const;
  readonly code = 'DOC_READ_FAILED';

  constructor(
    public readonly filePath: string,
    options?: ErrorOptions,
  ) {
    super(`Failed to read documentation file: ${filePath}`, options);
  }
}

export class DocumentDecodeError extends DocsServiceError {
  readonly kind = 'Unavailable' as const;
  readonly code = 'DOC_DECODE_FAILED';

  constructor(
    public readonly filePath: string,
    options?: ErrorOptions,
  ) {
    super(`Documentation file is not valid UTF-8 text: ${filePath}`, options);
  }
}
