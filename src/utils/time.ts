import type { Nanos } from '../types/ids.js';

export const NANOS_PER_MILLI = 1_000_000n;
export const NANOS_PER_SECOND = 1_000_000_000n;
export const NANOS_PER_MINUTE = 60n * NANOS_PER_SECOND;

export function nowNanos(): Nanos {
  return BigInt(Date.now()) * NANOS_PER_MILLI;
}

export function secondsToNanos(seconds: number): Nanos {
  return BigInt(Math.round(seconds * 1000)) * NANOS_PER_MILLI;
}

export function nanosToMinutes(value: Nanos): number {
  return Number(value / NANOS_PER_MILLI) / 60_000;
}

export function formatNanos(value: Nanos): string {
  return new Date(Number(value / NANOS_PER_MILLI)).toISOString();
}
