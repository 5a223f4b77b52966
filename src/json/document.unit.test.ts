import { describe, expect, it } from 'vitest';
import { asArray, asNumber, getField, parseDocument, stringField } from './document.js';
import { ErrorCode } from '../types/enums.js';

describe('parseDocument', () => {
  it('builds a tagged tree', () => {
    const result = parseDocument('{"a":[1,"x",null,true],"b":{"c":"d"}}');
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const items = asArray(getField(result.value, 'a'));
    expect(items?.map((item) => item.kind)).toEqual(['number', 'string', 'null', 'boolean']);
    expect(asNumber(items?.[0])).toBe(1);
    expect(stringField(getField(result.value, 'b'), 'c')).toBe('d');
  });

  it('reports malformed JSON as a parse error', () => {
    const result = parseDocument('{"a":', 'topology response');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe(ErrorCode.PARSE);
    expect(result.error.message.startsWith('Failed to parse topology response as JSON')).toBe(true);
  });
});

describe('field lookups', () => {
  it('returns undefined on missing fields and type mismatches', () => {
    const result = parseDocument('{"id":7,"name":"n"}');
    if (!result.ok) throw new Error('expected ok');
    expect(stringField(result.value, 'id')).toBeUndefined();
    expect(stringField(result.value, 'missing')).toBeUndefined();
    expect(getField({ kind: 'string', value: 'x' }, 'name')).toBeUndefined();
    expect(asArray(result.value)).toBeUndefined();
  });
});
