import { describe, it, expect } from 'vitest';
import { coerceValue } from '../../../src/lib/emitter/sql-values.js';
import type { ColumnSchema, SqlType } from '../../../src/types/data-model.js';

function columnOf(sqlType: SqlType): ColumnSchema {
  return {
    name: 'Value',
    path: ['Value'],
    sqlType,
    nullable: true,
    isPrimaryKey: false,
    kind: 'value',
    observed: {},
    mixedShape: false,
  };
}

describe('coerceValue', () => {
  it('should store numbers as text in TEXT columns', () => {
    expect(coerceValue(7, columnOf('TEXT'))).toBe('7');
    expect(coerceValue(2.5, columnOf('TEXT'))).toBe('2.5');
    expect(coerceValue('x', columnOf('TEXT'))).toBe('x');
  });

  it('should parse integer text in INTEGER columns', () => {
    expect(coerceValue('42', columnOf('INTEGER'))).toBe(42);
    expect(coerceValue('-3', columnOf('INTEGER'))).toBe(-3);
    expect(coerceValue(5, columnOf('INTEGER'))).toBe(5);
  });

  it('should leave unsafe or non-integer text in INTEGER columns as is', () => {
    expect(coerceValue('9007199254740993', columnOf('INTEGER'))).toBe('9007199254740993');
    expect(coerceValue('4.5', columnOf('INTEGER'))).toBe('4.5');
    expect(coerceValue('n/a', columnOf('INTEGER'))).toBe('n/a');
  });

  it('should parse numeric text in REAL columns', () => {
    expect(coerceValue('1.5', columnOf('REAL'))).toBe(1.5);
    expect(coerceValue('1e3', columnOf('REAL'))).toBe(1000);
    expect(coerceValue('abc', columnOf('REAL'))).toBe('abc');
  });

  it('should keep nulls', () => {
    expect(coerceValue(null, columnOf('INTEGER'))).toBeNull();
    expect(coerceValue(null, columnOf('TEXT'))).toBeNull();
  });
});
