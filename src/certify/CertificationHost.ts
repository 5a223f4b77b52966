import { ErrorCode } from '../types/enums.js';
import type { ServiceId } from '../types/ids.js';

export class CertificationError extends Error {
  readonly code = ErrorCode.CERTIFICATION;

  constructor(message: string) {
    super(message);
    this.name = 'CertificationError';
  }
}

export interface CertificationHost {
  // Throws CertificationError when the host cannot accept the fingerprint.
  register(fingerprint: Uint8Array): void;
  currentCertificate(): Uint8Array | undefined;
}

export interface CertificateInspection {
  valid: boolean;
  fingerprint?: Uint8Array;
}

export interface CertificateInspector {
  inspect(certificate: Uint8Array, serviceId: ServiceId): CertificateInspection;
}
