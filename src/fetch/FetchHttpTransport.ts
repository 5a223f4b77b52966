import type { HttpRequest, HttpResponse, HttpTransport } from './types.js';

export class TransportError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export interface FetchHttpTransportOptions {
  fetchFn?: typeof fetch;
  headers?: Record<string, string>;
}

export class FetchHttpTransport implements HttpTransport {
  private readonly fetchFn: typeof fetch;
  private readonly headers: Record<string, string>;

  constructor(options: FetchHttpTransportOptions = {}) {
    this.fetchFn = options.fetchFn ?? fetch;
    this.headers = { accept: 'application/json', ...options.headers };
  }

  async get(request: HttpRequest): Promise<HttpResponse> {
    let response: Response;
    try {
      response = await this.fetchFn(request.url, { method: 'GET', headers: this.headers });
    } catch (err) {
      throw new TransportError(`GET ${request.url} failed: ${err instanceof Error ? err.message : String(err)}`, {
        cause: err
      });
    }
    const declared = Number(response.headers.get('content-length') ?? NaN);
    if (Number.isFinite(declared) && declared > request.maxResponseBytes) {
      await response.body?.cancel();
      throw new TransportError(
        `GET ${request.url} response of ${declared} bytes exceeds limit of ${request.maxResponseBytes}`
      );
    }
    const body = await readLimited(response, request);
    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key] = value;
    });
    return { status: response.status, headers, body };
  }
}

async function readLimited(response: Response, request: HttpRequest): Promise<Uint8Array> {
  if (!response.body) return new Uint8Array(0);
  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;
  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    total += value.length;
    if (total > request.maxResponseBytes) {
      await reader.cancel();
      throw new TransportError(
        `GET ${request.url} response exceeds limit of ${request.maxResponseBytes} bytes`
      );
    }
    chunks.push(value);
  }
  const body = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    body.set(chunk, offset);
    offset += chunk.length;
  }
  return body;
}
