import type { HttpRequest, HttpResponse, HttpTransport } from './types.js';

type Route = HttpResponse | Error;

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): HttpResponse {
  return {
    status,
    headers: { 'content-type': 'application/json', ...headers },
    body: new TextEncoder().encode(JSON.stringify(body))
  };
}

export function textResponse(text: string, status = 200): HttpResponse {
  return { status, headers: {}, body: new TextEncoder().encode(text) };
}

/** In-process transport answering from a fixed route table. */
export class FakeTransport implements HttpTransport {
  readonly requests: HttpRequest[] = [];
  private readonly routes = new Map<string, Route>();

  route(url: string, response: Route): this {
    this.routes.set(url, response);
    return this;
  }

  async get(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);
    const route = this.routes.get(request.url);
    if (!route) throw new Error(`no route for ${request.url}`);
    if (route instanceof Error) throw route;
    return route;
  }
}

export const TOPOLOGY_URL = 'https://topology.test/api/v3/subnets';
export const HARDWARE_URL = 'https://hardware.test/api/v3/nodes';
