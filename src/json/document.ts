import { ErrorCode } from '../types/enums.js';
import { serviceError } from '../types/error.js';
import type { Result } from '../types/result.js';
import { err, ok } from '../types/result.js';

export type JsonValue =
  | { kind: 'object'; fields: ReadonlyMap<string, JsonValue> }
  | { kind: 'array'; items: readonly JsonValue[] }
  | { kind: 'string'; value: string }
  | { kind: 'number'; value: number }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'null' };

export type JsonObject = Extract<JsonValue, { kind: 'object' }>;

export function parseDocument(text: string, label = 'document'): Result<JsonValue> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    return err(serviceError(ErrorCode.PARSE, `Failed to parse ${label} as JSON: ${reason}`));
  }
  return ok(toJsonValue(raw));
}

export function toJsonValue(raw: unknown): JsonValue {
  if (raw === null || raw === undefined) return { kind: 'null' };
  if (typeof raw === 'string') return { kind: 'string', value: raw };
  if (typeof raw === 'number') return { kind: 'number', value: raw };
  if (typeof raw === 'boolean') return { kind: 'boolean', value: raw };
  if (Array.isArray(raw)) return { kind: 'array', items: raw.map(toJsonValue) };
  if (typeof raw === 'object') {
    const fields = new Map<string, JsonValue>();
    for (const [key, value] of Object.entries(raw)) {
      fields.set(key, toJsonValue(value));
    }
    return { kind: 'object', fields };
  }
  return { kind: 'null' };
}

export function asObject(value: JsonValue | undefined): JsonObject | undefined {
  return value?.kind === 'object' ? value : undefined;
}

export function asArray(value: JsonValue | undefined): readonly JsonValue[] | undefined {
  return value?.kind === 'array' ? value.items : undefined;
}

export function asString(value: JsonValue | undefined): string | undefined {
  return value?.kind === 'string' ? value.value : undefined;
}

export function asNumber(value: JsonValue | undefined): number | undefined {
  return value?.kind === 'number' ? value.value : undefined;
}

export function getField(value: JsonValue | undefined, name: string): JsonValue | undefined {
  return asObject(value)?.fields.get(name);
}

export function stringField(value: JsonValue | undefined, name: string): string | undefined {
  return asString(getField(value, name));
}
