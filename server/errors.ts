export type InsightsErrorKind =
  | 'UnsupportedFormat'
  | 'Encrypted'
  | 'EmptyContent'
  | 'UnresolvableReference'
  | 'RemoteError'
  | 'EmptyResponse'
  | 'MisconfiguredProvider'
  | 'UnsupportedProvider'
  | 'Timeout'
  | 'InvalidUpload'
  | 'ExtractionFailed'
  | 'NotFound'
  | 'InvalidRequest';

export class InsightsError extends Error {
  readonly kind: InsightsErrorKind;

  constructor(kind: InsightsErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InsightsError';
    this.kind = kind;
  }
}

/** Non-2xx answer from a remote service; the body is kept verbatim. */
export class RemoteError extends InsightsError {
  readonly status: number;
  readonly body: string;

  constructor(service: string, status: number, body: string) {
    super('RemoteError', `${service} request failed with status ${status}: ${body || 'No response body'}`);
    this.name = 'RemoteError';
    this.status = status;
    this.body = body;
  }
}

export const isInsightsError = (error: unknown): error is InsightsError => error instanceof InsightsError;

export const hasKind = (error: unknown, kind: InsightsErrorKind): boolean =>
  isInsightsError(error) && error.kind === kind;

const HTTP_STATUS: Record<InsightsErrorKind, number> = {
  UnsupportedFormat: 422,
  Encrypted: 422,
  EmptyContent: 422,
  ExtractionFailed: 422,
  UnresolvableReference: 400,
  InvalidUpload: 400,
  InvalidRequest: 400,
  UnsupportedProvider: 400,
  NotFound: 404,
  RemoteError: 502,
  EmptyResponse: 502,
  MisconfiguredProvider: 503,
  Timeout: 504,
};

export const httpStatusFor = (error: unknown): number =>
  isInsightsError(error) ? HTTP_STATUS[error.kind] : 500;
