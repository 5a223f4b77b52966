import type { ServiceId } from '../types/ids.js';
import type { CertifiedSnapshot } from '../types/stats.js';
import { bytesEqual } from '../utils/crypto.js';
import { statsFingerprint } from './canonical.js';
import type { CertificateInspector } from './CertificationHost.js';

export enum VerificationFailure {
  NO_CERTIFICATE = 'NO_CERTIFICATE',
  INVALID_CERTIFICATE = 'INVALID_CERTIFICATE',
  FINGERPRINT_MISMATCH = 'FINGERPRINT_MISMATCH'
}

export type VerificationResult = { verified: true } | { verified: false; failure: VerificationFailure };

export function verifyCertifiedSnapshot(
  bundle: CertifiedSnapshot,
  serviceId: ServiceId,
  inspector: CertificateInspector
): VerificationResult {
  if (!bundle.hostCertificate || bundle.hostCertificate.length === 0) {
    return { verified: false, failure: VerificationFailure.NO_CERTIFICATE };
  }
  const recomputed = statsFingerprint(bundle.stats);
  const inspection = inspector.inspect(bundle.hostCertificate, serviceId);
  if (!inspection.valid || !inspection.fingerprint) {
    return { verified: false, failure: VerificationFailure.INVALID_CERTIFICATE };
  }
  if (!bytesEqual(inspection.fingerprint, recomputed) || !bytesEqual(bundle.fingerprint, recomputed)) {
    return { verified: false, failure: VerificationFailure.FINGERPRINT_MISMATCH };
  }
  return { verified: true };
}
