export function utf8Bytes(value: string): Uint8Array {
  return new TextEncoder().encode(value);
}

// undefined on malformed input rather than U+FFFD substitution.
export function decodeUtf8Strict(bytes: Uint8Array): string | undefined {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (err) {
    if (err instanceof TypeError) return undefined;
    throw err;
  }
}

export function utf8String(bytes: Uint8Array): string {
  return new TextDecoder().decode(bytes);
}
