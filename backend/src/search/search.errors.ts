export type SearchErrorCode = 'INVALID_INPUT';

export class SearchError extends Error {
  public readonly code: SearchErrorCode;

  constructor(code: SearchErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = 'SearchError';
  }
}
