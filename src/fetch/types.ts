export interface HttpRequest {
  url: string;
  maxResponseBytes: number;
}

export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: Uint8Array;
}

export interface SanitizedResponse {
  status: number;
  body: Uint8Array;
}

export interface HttpTransport {
  get(request: HttpRequest): Promise<HttpResponse>;
}

export interface ResourceBudget {
  available(): bigint;
}
