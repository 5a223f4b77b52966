import type { HttpResponse, SanitizedResponse } from './types.js';

// Only status and body survive; headers differ between otherwise identical responses.
export function sanitizeResponse(response: HttpResponse): SanitizedResponse {
  return { status: response.status, body: response.body.slice() };
}
