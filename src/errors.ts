import axios from 'axios';

/**
 * Any failure talking to Overseerr: connection errors, timeouts and non-2xx
 * responses. Carries the upstream status and body when there was a response.
 */
export class TransportError extends Error {
  readonly status?: number;
  readonly body?: unknown;
  readonly method?: string;
  readonly url?: string;

  constructor(
    message: string,
    details: { status?: number; body?: unknown; method?: string; url?: string } = {}
  ) {
    super(message);
    this.name = 'TransportError';
    this.status = details.status;
    this.body = details.body;
    this.method = details.method;
    this.url = details.url;
  }

  static fromAxios(error: unknown): TransportError {
    if (error instanceof TransportError) {
      return error;
    }
    if (axios.isAxiosError(error)) {
      return new TransportError(error.message, {
        status: error.response?.status,
        body: error.response?.data,
        method: error.config?.method?.toUpperCase(),
        url: error.config?.url,
      });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new TransportError(message);
  }

  /**
   * Upstream body as text, or undefined when there was no response body.
   */
  bodyText(): string | undefined {
    if (this.body === undefined || this.body === null || this.body === '') {
      return undefined;
    }
    return typeof this.body === 'string' ? this.body : JSON.stringify(this.body);
  }

  /**
   * Best human-readable reason: Overseerr's `message` field, then the raw body,
   * then the error message itself.
   */
  upstreamMessage(): string {
    const body = this.body;
    if (typeof body === 'object' && body !== null && 'message' in body) {
      const message = body.message;
      if (typeof message === 'string' && message.length > 0) {
        return message;
      }
    }
    return this.bodyText() ?? this.message;
  }
}

/**
 * Required configuration could not be resolved from any source. Fatal: the
 * service cannot start without it.
 */
export class ConfigurationMissingError extends Error {
  readonly missingKeys: string[];

  constructor(missingKeys: string[]) {
    super(`Missing required configuration: ${missingKeys.join(', ')}`);
    this.name = 'ConfigurationMissingError';
    this.missingKeys = missingKeys;
  }
}
