import { describe, it, expect } from 'vitest';
import { evaluateField, parseNumber } from '../lib/rules-engine';
import type { FieldRule } from '../lib/types';

const check = (value: string, rule: FieldRule) => evaluateField('col', value, rule, 7);

describe('evaluateField', () => {
  it('skips blank and whitespace-only values', () => {
    expect(check('', { type: 'number' })).toBeUndefined();
    expect(check('   ', { type: 'date' })).toBeUndefined();
  });

  it('reports row, column, trimmed value and error severity', () => {
    expect(evaluateField('event_date', ' 13/01/2024 ', { type: 'date' }, 3)).toEqual({
      rowNumber: 3,
      column: 'event_date',
      value: '13/01/2024',
      message: 'Invalid date format. Expected MM/DD/YYYY',
      severity: 'error',
    });
  });
});

describe('list rule', () => {
  const colors: FieldRule = { type: 'list', allowed: ['Red', 'Green', 'Blue'] };
  const yesNo: FieldRule = { type: 'list', allowed: ['No', 'Yes'] };

  it('accepts exact members', () => {
    expect(check('Green', colors)).toBeUndefined();
  });

  it('is case-sensitive for ordinary lists', () => {
    expect(check('green', colors)?.message).toBe('Must be one of: Red, Green, Blue');
  });

  it('folds case for the Yes/No pair in any order', () => {
    expect(check('yes', yesNo)).toBeUndefined();
    expect(check('YES', yesNo)).toBeUndefined();
    expect(check('No ', yesNo)).toBeUndefined();
    expect(check('Maybe', yesNo)?.message).toBe('Must be one of: No, Yes');
  });

  it('does not fold case when the list holds more than Yes and No', () => {
    expect(check('yes', { type: 'list', allowed: ['Yes', 'No', 'Unknown'] })?.message).toBe(
      'Must be one of: Yes, No, Unknown'
    );
  });

  it('lists at most five allowed values', () => {
    const rule: FieldRule = { type: 'list', allowed: ['A', 'B', 'C', 'D', 'E', 'F'] };
    expect(check('Z', rule)?.message).toBe('Must be one of: A, B, C, D, E...');
  });

  it('suggests the closest allowed value', () => {
    expect(check('green', colors)?.suggestion).toBe('Green');
    expect(check('Bleu', colors)?.suggestion).toBe('Blue');
    expect(check('Purple', colors)?.suggestion).toBeUndefined();
  });

  it('can turn suggestions off', () => {
    expect(evaluateField('col', 'green', colors, 2, { fuzzyMaxDistance: 0 })).not.toHaveProperty('suggestion');
  });
});

describe('date rule', () => {
  const rule: FieldRule = { type: 'date' };

  it('checks shape and ranges only', () => {
    expect(check('09/23/2025', rule)).toBeUndefined();
    expect(check('02/30/2024', rule)).toBeUndefined();
  });

  it('rejects bad months and missing zero padding', () => {
    expect(check('13/01/2024', rule)?.message).toBe('Invalid date format. Expected MM/DD/YYYY');
    expect(check('1/2/2024', rule)).toBeDefined();
    expect(check('01/32/2024', rule)).toBeDefined();
    expect(check('01/02/24', rule)).toBeDefined();
  });

  it('uses the rule format in the message', () => {
    expect(check('2024-01-01', { type: 'date', format: 'MM/DD/YYYY (US)' })?.message).toBe(
      'Invalid date format. Expected MM/DD/YYYY (US)'
    );
  });
});

describe('time rule', () => {
  const rule: FieldRule = { type: 'time' };

  it('accepts two-digit hour and minute', () => {
    expect(check('08:21', rule)).toBeUndefined();
    expect(check('25:00', rule)).toBeUndefined();
  });

  it('rejects missing padding', () => {
    expect(check('8:21', rule)?.message).toBe('Invalid time format. Expected HH:MM');
  });
});

describe('number rule', () => {
  it('rejects non-numbers before checking bounds', () => {
    expect(check('abc', { type: 'number', min: 0, max: 10 })?.message).toBe('Must be a number');
  });

  it('enforces inclusive bounds', () => {
    expect(check('5', { type: 'number', min: 10 })?.message).toBe('Value must be >= 10');
    expect(check('11', { type: 'number', max: 10 })?.message).toBe('Value must be <= 10');
    expect(check('10', { type: 'number', min: 10, max: 10 })).toBeUndefined();
    expect(check('-2.5', { type: 'number', min: -3 })).toBeUndefined();
  });

  it('accepts float literal forms', () => {
    expect(check('1e3', { type: 'number', max: 1000 })).toBeUndefined();
    expect(check('.5', { type: 'number' })).toBeUndefined();
  });
});

describe('pattern rule', () => {
  it('matches the upper-cased value from the start', () => {
    const rule: FieldRule = { type: 'pattern', pattern: /[A-Z]{2}\d{3}/ };
    expect(check('ab123', rule)).toBeUndefined();
    expect(check('AB123-extra', rule)).toBeUndefined();
    expect(check('x-AB123', rule)?.message).toBe('Must match pattern: [A-Z]{2}\\d{3}');
  });

  it('anchors every alternative at the start', () => {
    const rule: FieldRule = { type: 'pattern', pattern: /AA|BB/ };
    expect(check('bb', rule)).toBeUndefined();
    expect(check('xbb', rule)).toBeDefined();
  });

  it('prefers the rule description', () => {
    const rule: FieldRule = { type: 'pattern', pattern: /\d{5}/, description: 'Must be a 5 digit code' };
    expect(check('12a45', rule)?.message).toBe('Must be a 5 digit code');
  });
});

describe('parseNumber', () => {
  it('parses decimal, signed and exponent forms', () => {
    expect(parseNumber('42')).toBe(42);
    expect(parseNumber('-3.5')).toBe(-3.5);
    expect(parseNumber('+2E2')).toBe(200);
    expect(parseNumber('1_000')).toBe(1000);
  });

  it('parses infinity and nan words', () => {
    expect(parseNumber('-inf')).toBe(-Infinity);
    expect(parseNumber('Infinity')).toBe(Infinity);
    expect(parseNumber('NaN')).toBeNaN();
  });

  it('returns null for anything else', () => {
    expect(parseNumber('12abc')).toBeNull();
    expect(parseNumber('0x10')).toBeNull();
    expect(parseNumber('1__0')).toBeNull();
    expect(parseNumber('.')).toBeNull();
  });
});
