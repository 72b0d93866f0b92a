const MAX_BODY_IN_MESSAGE = 300;

export class TransportError extends Error {
  readonly kind = 'transport';

  /**
   * @param status HTTP status, or null when no response arrived at all.
   * @param body Raw response body text, kept for diagnostics.
   * @param detail Readable text to show instead of the body, when one could be extracted.
   */
  constructor(
    readonly status: number | null,
    readonly body: string,
    detail: string = body,
  ) {
    super(status === null ? `Network error: ${detail}` : `API Error ${status}: ${truncate(detail)}`);
    this.name = 'TransportError';
  }
}

export class MalformedResponseError extends Error {
  readonly kind = 'malformed';

  constructor(readonly detail: string) {
    super(`Malformed response: ${detail}`);
    this.name = 'MalformedResponseError';
  }
}

// Upstream content that parsed but breaks a Question invariant.
export class ValidationError extends Error {
  readonly kind = 'validation';

  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class MissingCredentialError extends Error {
  readonly kind = 'missingCredential';

  constructor(readonly variable: string) {
    super(`${variable} not found in environment`);
    this.name = 'MissingCredentialError';
  }
}

export type FetchError = TransportError | MalformedResponseError | ValidationError;

export const describeFetchError = (error: FetchError): string => {
  switch (error.kind) {
    case 'transport':
    case 'malformed':
      return error.message;
    case 'validation':
      return `Invalid question: ${error.message}`;
  }
};

function truncate(text: string): string {
  const trimmed = text.trim();
  return trimmed.length > MAX_BODY_IN_MESSAGE ? `${trimmed.slice(0, MAX_BODY_IN_MESSAGE)}…` : trimmed;
}
