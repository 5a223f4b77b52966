import type { CertificationHost } from './CertificationHost.js';
import { CertificationError } from './CertificationHost.js';

/** Host whose certificate is the registered fingerprint itself; can be told to refuse registrations. */
export class RecordingHost implements CertificationHost {
  readonly registrations: Uint8Array[] = [];
  failWith?: string;

  register(fingerprint: Uint8Array): void {
    if (this.failWith !== undefined) throw new CertificationError(this.failWith);
    this.registrations.push(fingerprint.slice());
  }

  currentCertificate(): Uint8Array | undefined {
    const last = this.registrations.at(-1);
    return last ? last.slice() : undefined;
  }
}
