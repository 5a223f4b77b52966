import type { ServiceId } from '../types/ids.js';
import { bytesEqual, fromHex, hmacSha256Bytes, toHex } from '../utils/crypto.js';
import { utf8Bytes, utf8String } from '../utils/utf8.js';
import type { CertificateInspection, CertificateInspector, CertificationHost } from './CertificationHost.js';
import { CertificationError } from './CertificationHost.js';

const CERTIFICATE_VERSION = 'v1';
export const MAX_CERTIFIED_DATA_BYTES = 32;

export interface LocalCertificationHostOptions {
  serviceId: ServiceId;
  secret: string;
  maxFingerprintBytes?: number;
}

/**
 * In-process certification host. Certificates read
 * `v1.<serviceId>.<fingerprintHex>.<hmacHex>` where the MAC covers the service id and
 * fingerprint under the host secret.
 */
export class LocalCertificationHost implements CertificationHost, CertificateInspector {
  private readonly serviceId: ServiceId;
  private readonly secret: string;
  private readonly maxFingerprintBytes: number;
  private registered?: Uint8Array;

  constructor(options: LocalCertificationHostOptions) {
    if (options.serviceId.includes('.')) {
      throw new CertificationError('Service id must not contain "."');
    }
    this.serviceId = options.serviceId;
    this.secret = options.secret;
    this.maxFingerprintBytes = options.maxFingerprintBytes ?? MAX_CERTIFIED_DATA_BYTES;
  }

  register(fingerprint: Uint8Array): void {
    if (fingerprint.length > this.maxFingerprintBytes) {
      throw new CertificationError(
        `Certified data of ${fingerprint.length} bytes exceeds host limit of ${this.maxFingerprintBytes}`
      );
    }
    this.registered = fingerprint.slice();
  }

  currentCertificate(): Uint8Array | undefined {
    if (!this.registered) return undefined;
    const mac = toHex(this.sign(this.serviceId, this.registered));
    return utf8Bytes([CERTIFICATE_VERSION, this.serviceId, toHex(this.registered), mac].join('.'));
  }

  inspect(certificate: Uint8Array, serviceId: ServiceId): CertificateInspection {
    const parts = utf8String(certificate).split('.');
    if (parts.length !== 4) return { valid: false };
    const [version, certServiceId, fingerprintHex, mac] = parts;
    if (version !== CERTIFICATE_VERSION || certServiceId !== serviceId) return { valid: false };
    const fingerprint = fromHex(fingerprintHex);
    if (!fingerprint) return { valid: false };
    const macBytes = fromHex(mac);
    if (!macBytes || !bytesEqual(macBytes, this.sign(certServiceId, fingerprint))) return { valid: false };
    return { valid: true, fingerprint };
  }

  private sign(serviceId: ServiceId, fingerprint: Uint8Array): Uint8Array {
    return hmacSha256Bytes(this.secret, utf8Bytes(serviceId), utf8Bytes('.'), fingerprint);
  }
}
