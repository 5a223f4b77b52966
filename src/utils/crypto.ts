import { createHash, createHmac, timingSafeEqual } from 'node:crypto';

export function sha256Bytes(data: Uint8Array | string): Uint8Array {
  const hash = createHash('sha256');
  if (typeof data === 'string') hash.update(data, 'utf8');
  else hash.update(data);
  return new Uint8Array(hash.digest());
}

export function sha256Hex(value: Uint8Array | string): string {
  return toHex(sha256Bytes(value));
}

export function hmacSha256Bytes(secret: string, ...parts: Uint8Array[]): Uint8Array {
  const mac = createHmac('sha256', secret);
  for (const part of parts) {
    mac.update(part);
  }
  return new Uint8Array(mac.digest());
}

export function hmacSha256Hex(secret: string, ...parts: Uint8Array[]): string {
  return toHex(hmacSha256Bytes(secret, ...parts));
}

export function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('hex');
}

export function fromHex(value: string): Uint8Array | undefined {
  if (value.length % 2 !== 0 || !/^[0-9a-f]*$/i.test(value)) return undefined;
  return new Uint8Array(Buffer.from(value, 'hex'));
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  return timingSafeEqual(a, b);
}
