import { createHash } from 'node:crypto';
import { describe, expect, it } from 'vitest';
import { canonicalStatsString, statsFingerprint } from './canonical.js';
import { CertificationError } from './CertificationHost.js';
import { LocalCertificationHost } from './LocalCertificationHost.js';
import { VerificationFailure, verifyCertifiedSnapshot } from './verify.js';
import { zeroStats } from '../aggregate/stats.js';
import type { NetworkStats } from '../types/stats.js';
import { utf8String } from '../utils/utf8.js';

const STATS: NetworkStats = {
  totalSubnets: 1,
  totalNodes: 2,
  gen1Nodes: 1,
  gen2Nodes: 1,
  unknownNodes: 0,
  lastUpdated: 1_700_000_000_000_000_000n
};

function sha256(text: string): Uint8Array {
  return new Uint8Array(createHash('sha256').update(text, 'utf8').digest());
}

function makeHost(serviceId = 'svc-1', secret = 'test-secret') {
  return new LocalCertificationHost({ serviceId, secret });
}

describe('canonicalStatsString', () => {
  it('writes fields in a fixed order as decimal integers', () => {
    expect(canonicalStatsString(STATS)).toBe(
      'subnets:1,nodes:2,gen1:1,gen2:1,unknown:0,updated:1700000000000000000'
    );
  });

  it('fingerprints the canonical string with SHA-256', () => {
    expect(statsFingerprint(STATS)).toEqual(sha256(canonicalStatsString(STATS)));
    expect(statsFingerprint(zeroStats())).toEqual(sha256('subnets:0,nodes:0,gen1:0,gen2:0,unknown:0,updated:0'));
  });

  it('changes when any field changes', () => {
    const base = statsFingerprint(STATS);
    expect(statsFingerprint({ ...STATS, unknownNodes: 1 })).not.toEqual(base);
    expect(statsFingerprint({ ...STATS, lastUpdated: STATS.lastUpdated + 1n })).not.toEqual(base);
  });
});

describe('LocalCertificationHost', () => {
  it('offers no certificate before the first registration', () => {
    expect(makeHost().currentCertificate()).toBeUndefined();
  });

  it('certifies the registered fingerprint for its service id', () => {
    const host = makeHost();
    const fingerprint = new Uint8Array(32).fill(0xab);
    host.register(fingerprint);
    const certificate = host.currentCertificate();
    expect(certificate).toBeDefined();
    if (!certificate) return;
    const parts = utf8String(certificate).split('.');
    expect(parts.slice(0, 3)).toEqual(['v1', 'svc-1', 'ab'.repeat(32)]);
    expect(parts[3]).toMatch(/^[0-9a-f]{64}$/);
    expect(host.inspect(certificate, 'svc-1')).toEqual({ valid: true, fingerprint });
  });

  it('rejects certificates for another service, another secret or with a forged mac', () => {
    const host = makeHost();
    host.register(new Uint8Array(32).fill(1));
    const certificate = host.currentCertificate();
    if (!certificate) throw new Error('expected a certificate');
    expect(host.inspect(certificate, 'svc-2')).toEqual({ valid: false });
    expect(makeHost('svc-1', 'other-secret').inspect(certificate, 'svc-1')).toEqual({ valid: false });

    const text = utf8String(certificate);
    const forged = `${text.slice(0, -1)}${text.endsWith('0') ? '1' : '0'}`;
    expect(host.inspect(new TextEncoder().encode(forged), 'svc-1')).toEqual({ valid: false });
    expect(host.inspect(new TextEncoder().encode('garbage'), 'svc-1')).toEqual({ valid: false });
  });

  it('compares the mac as bytes', () => {
    const host = makeHost();
    const fingerprint = new Uint8Array(32).fill(2);
    host.register(fingerprint);
    const certificate = host.currentCertificate();
    if (!certificate) throw new Error('expected a certificate');
    const [version, serviceId, fingerprintHex, mac] = utf8String(certificate).split('.');
    const encode = (macText: string) => new TextEncoder().encode([version, serviceId, fingerprintHex, macText].join('.'));

    expect(host.inspect(encode(mac.toUpperCase()), 'svc-1')).toEqual({ valid: true, fingerprint });
    expect(host.inspect(encode(mac.slice(0, 62)), 'svc-1')).toEqual({ valid: false });
    expect(host.inspect(encode(`${mac}00`), 'svc-1')).toEqual({ valid: false });
    expect(host.inspect(encode('zz'.repeat(32)), 'svc-1')).toEqual({ valid: false });
  });

  it('refuses fingerprints over the host limit and keeps the previous registration', () => {
    const host = makeHost();
    const accepted = new Uint8Array(32).fill(7);
    host.register(accepted);
    const before = host.currentCertificate();
    expect(() => host.register(new Uint8Array(33))).toThrow(CertificationError);
    expect(() => host.register(new Uint8Array(33))).toThrow('Certified data of 33 bytes exceeds host limit of 32');
    expect(host.currentCertificate()).toEqual(before);
  });

  it('refuses service ids containing the separator', () => {
    expect(() => makeHost('svc.1')).toThrow('Service id must not contain "."');
  });
});

describe('verifyCertifiedSnapshot', () => {
  function certifiedBundle(stats: NetworkStats = STATS) {
    const host = makeHost();
    const fingerprint = statsFingerprint(stats);
    host.register(fingerprint);
    return { host, bundle: { stats, fingerprint, hostCertificate: host.currentCertificate() } };
  }

  it('accepts an untouched bundle', () => {
    const { host, bundle } = certifiedBundle();
    expect(verifyCertifiedSnapshot(bundle, 'svc-1', host)).toEqual({ verified: true });
  });

  it('rejects a bundle whose stats were altered in transit', () => {
    const { host, bundle } = certifiedBundle();
    const tampered = { ...bundle, stats: { ...bundle.stats, gen1Nodes: bundle.stats.gen1Nodes + 1 } };
    expect(verifyCertifiedSnapshot(tampered, 'svc-1', host)).toEqual({
      verified: false,
      failure: VerificationFailure.FINGERPRINT_MISMATCH
    });
  });

  it('rejects a bundle whose returned fingerprint differs from the stats', () => {
    const { host, bundle } = certifiedBundle();
    const tampered = { ...bundle, fingerprint: new Uint8Array(32) };
    expect(verifyCertifiedSnapshot(tampered, 'svc-1', host)).toEqual({
      verified: false,
      failure: VerificationFailure.FINGERPRINT_MISMATCH
    });
  });

  it('rejects a bundle without a certificate', () => {
    const { host, bundle } = certifiedBundle();
    expect(verifyCertifiedSnapshot({ stats: bundle.stats, fingerprint: bundle.fingerprint }, 'svc-1', host)).toEqual({
      verified: false,
      failure: VerificationFailure.NO_CERTIFICATE
    });
  });

  it('rejects a certificate issued to another service', () => {
    const { host, bundle } = certifiedBundle();
    expect(verifyCertifiedSnapshot(bundle, 'svc-2', host)).toEqual({
      verified: false,
      failure: VerificationFailure.INVALID_CERTIFICATE
    });
  });
});
