const MAX_BODY_LENGTH = 200;

// Request fields that must never reach logs or error payloads
const SENSITIVE_FIELDS = [
  'password',
  'token',
  'authorization',
  'apikey',
  'api_key',
  'secret',
  'credential',
  'access_token',
  'refresh_token',
  'email_address',
  'merge_fields',
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * UpstreamError - normalized failure of a call to an external API
 * (Google Drive, Cloud Vision, Mailchimp).
 *
 * Carries the upstream status and path plus a redacted, truncated copy of the
 * request body. Contact values are never included.
 */
export class UpstreamError extends Error {
  /**
   * HTTP status from the upstream response (502 for network errors)
   */
  readonly status: number;

  /**
   * Correlation ID for request tracing
   */
  readonly requestId: string;

  /**
   * Upstream API path that was called
   */
  readonly upstreamPath: string;

  /**
   * Redacted request body, at most 200 characters
   */
  readonly upstreamBody: string | null;

  readonly timestamp: string;

  constructor(params: {
    status: number;
    message: string;
    requestId: string;
    upstreamPath: string;
    upstreamBody?: unknown;
  }) {
    super(params.message);
    this.name = 'UpstreamError';
    this.status = params.status;
    this.requestId = params.requestId;
    this.upstreamPath = params.upstreamPath;
    this.timestamp = new Date().toISOString();
    this.upstreamBody = UpstreamError.sanitizeBody(params.upstreamBody);

    Object.setPrototypeOf(this, UpstreamError.prototype);
  }

  private static sanitizeBody(body: unknown): string | null {
    if (body === undefined || body === null || body === '') {
      return null;
    }

    let parsed: unknown = body;
    if (typeof body === 'string') {
      try {
        parsed = JSON.parse(body);
      } catch {
        // Not JSON: keep the raw text
        return body.substring(0, MAX_BODY_LENGTH);
      }
    }

    if (!isRecord(parsed)) {
      return String(parsed).substring(0, MAX_BODY_LENGTH);
    }

    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(parsed)) {
      sanitized[key] = SENSITIVE_FIELDS.includes(key.toLowerCase())
        ? '[REDACTED]'
        : value;
    }

    try {
      return JSON.stringify(sanitized).substring(0, MAX_BODY_LENGTH);
    } catch {
      return '[Unable to serialize body]';
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      error: 'UpstreamError',
      message: this.message,
      status: this.status,
      requestId: this.requestId,
      upstreamPath: this.upstreamPath,
      timestamp: this.timestamp,
    };
  }

  /**
   * Build from a non-2xx fetch Response. Reads the problem `detail`/`title`
   * (Mailchimp) or `error.message` (Google APIs) when the body is JSON.
   */
  static async fromResponse(
    response: Response,
    requestId: string,
    upstreamPath: string,
    requestBody?: unknown,
  ): Promise<UpstreamError> {
    let message = `Upstream error: ${response.status} ${response.statusText}`;
    try {
      const json: unknown = JSON.parse(await response.text());
      if (isRecord(json)) {
        const nested = isRecord(json.error) ? json.error.message : json.error;
        const candidate = json.detail ?? json.title ?? nested ?? json.message;
        if (typeof candidate === 'string' && candidate) {
          message = candidate;
        }
      }
    } catch {
      // Body is not JSON; keep the status line
      message = `Upstream error: ${response.status} ${response.statusText}`;
    }

    return new UpstreamError({
      status: response.status,
      message,
      requestId,
      upstreamPath,
      upstreamBody: requestBody,
    });
  }

  static fromNetworkError(
    error: unknown,
    requestId: string,
    upstreamPath: string,
    requestBody?: unknown,
  ): UpstreamError {
    const reason = error instanceof Error ? error.message : String(error);
    return new UpstreamError({
      status: 502, // Bad Gateway
      message: `Network error: ${reason}`,
      requestId,
      upstreamPath,
      upstreamBody: requestBody,
    });
  }
}
