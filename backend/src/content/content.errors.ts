export type ContentStoreErrorCode =
  | 'NOT_FOUND'
  | 'INCOMPLETE_RECORD'
  | 'STORAGE_FAILED';

export class ContentStoreError extends Error {
  public readonly code: ContentStoreErrorCode;

  constructor(
    code: ContentStoreErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.code = code;
    this.name = 'ContentStoreError';
  }

  static notFound(id: string): ContentStoreError {
    return new ContentStoreError('NOT_FOUND', `Content not found: ${id}`);
  }
}

export const isContentStoreError = (
  error: unknown,
  code?: ContentStoreErrorCode,
): error is ContentStoreError =>
  error instanceof ContentStoreError && (code === undefined || error.code === code);
