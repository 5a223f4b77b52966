import type { Nanos } from './ids.js';
import { ErrorCode } from './enums.js';

export interface ServiceError {
  code: ErrorCode;
  message: string;
  status?: number;
  retryAfterNs?: Nanos;
  inFlight?: boolean;
}

export function serviceError(code: ErrorCode, message: string, extra: Partial<Omit<ServiceError, 'code' | 'message'>> = {}): ServiceError {
  return { code, message, ...extra };
}
