/**
 * Outbound HTTP for third-party APIs
 *
 * Non-2xx answers come back as a normal response; only transport failures
 * (DNS, refused connection, timeout) throw.
 */

export interface HttpResponse {
  status: number;
  body: string;
}

export interface HttpRequestOptions {
  headers: Record<string, string>;
  timeoutMs: number;
}

export interface HttpClient {
  get(url: string, options: HttpRequestOptions): Promise<HttpResponse>;
}

export class HttpTransportError extends Error {
  constructor(
    public readonly url: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'HttpTransportError';
    Object.setPrototypeOf(this, HttpTransportError.prototype);
  }
}

export const isSuccessStatus = (status: number): boolean => status >= 200 && status < 300;

/**
 * HttpClient backed by the global fetch of Node.js 20
 */
export class FetchHttpClient implements HttpClient {
  async get(url: string, options: HttpRequestOptions): Promise<HttpResponse> {
    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: options.headers,
        signal: AbortSignal.timeout(options.timeoutMs),
      });
      const body = await response.text();
      return { status: response.status, body };
    } catch (error) {
      const reason =
        error instanceof Error && error.name === 'TimeoutError'
          ? `timed out after ${options.timeoutMs}ms`
          : 'network error';
      throw new HttpTransportError(url, `GET ${url} failed: ${reason}`, { cause: error });
    }
  }
}
