/*
  rules-engine
  -------------------------------------
  Deterministic per-field validation for template rules.
  - Rule kinds: list (with Yes/No case folding), date, time, number (bounds), pattern
  - Empty cells are never findings here; required-ness is a caller policy
  - At most one finding per (row, column); every finding is currently an error

  Usage:
    const finding = evaluateField('event_date', '13/45/2024', { type: 'date' }, 2);
    // -> { rowNumber: 2, column: 'event_date', message: 'Invalid date format. Expected MM/DD/YYYY', ... }
*/

import levenshtein from 'js-levenshtein';
import type {
  DateRule,
  EngineOptions,
  FieldFinding,
  FieldRule,
  ListRule,
  NumberRule,
  PatternRule,
  TimeRule,
} from './types';

// --------------------------
// Types
// --------------------------
interface Check {
  valid: boolean;
  problem?: string;
  suggestion?: string;
}

const OK: Check = { valid: true };

export const DEFAULT_DATE_FORMAT = 'MM/DD/YYYY';
export const DEFAULT_TIME_FORMAT = 'HH:MM';
export const DEFAULT_FUZZY_MAX_DISTANCE = 2;

const DATE_RE = /^(0[1-9]|1[0-2])\/(0[1-9]|[12][0-9]|3[01])\/\d{4}$/;
const TIME_RE = /^\d{2}:\d{2}$/;
const DIGITS = String.raw`\d(?:_?\d)*`;
const FLOAT_RE = new RegExp(`^[+-]?(?:${DIGITS}(?:\\.(?:${DIGITS})?)?|\\.${DIGITS})(?:[eE][+-]?${DIGITS})?$`);
const SPECIAL_FLOAT_RE = /^([+-]?)(inf|infinity|nan)$/i;

// --------------------------
// Helpers
// --------------------------
const isYesNo = (allowed: readonly string[]) =>
  allowed.length === 2 && allowed.includes('Yes') && allowed.includes('No');

function listPreview(allowed: readonly string[]) {
  return `${allowed.slice(0, 5).join(', ')}${allowed.length > 5 ? '...' : ''}`;
}

/** Float parsing with the usual literal forms (sign, exponent, digit separators, inf/nan). */
export function parseNumber(text: string): number | null {
  const special = SPECIAL_FLOAT_RE.exec(text);
  if (special) {
    if (special[2].toLowerCase() === 'nan') return NaN;
    return special[1] === '-' ? -Infinity : Infinity;
  }
  if (!FLOAT_RE.test(text)) return null;
  return Number(text.replace(/_/g, ''));
}

function closest(value: string, candidates: readonly string[], maxDistance: number): string | undefined {
  if (maxDistance <= 0) return undefined;
  let best: { cand: string; dist: number } | undefined;
  for (const cand of candidates) {
    const d = levenshtein(value.toLowerCase(), cand.toLowerCase());
    if (!best || d < best.dist) best = { cand, dist: d };
  }
  return best && best.dist <= maxDistance ? best.cand : undefined;
}

// Sticky copies give start-anchored matching without rewriting the source.
const stickyCache = new WeakMap<RegExp, RegExp>();

function matchesAtStart(pattern: RegExp, value: string) {
  let sticky = stickyCache.get(pattern);
  if (!sticky) {
    sticky = new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, '') + 'y');
    stickyCache.set(pattern, sticky);
  }
  sticky.lastIndex = 0;
  return sticky.test(value);
}

// --------------------------
// Built-in validators
// --------------------------
const validators = {
  list(value: string, rule: ListRule, options: EngineOptions): Check {
    if (rule.allowed.includes(value)) return OK;
    if (isYesNo(rule.allowed)) {
      const lowered = value.toLowerCase();
      if (rule.allowed.some((a) => a.toLowerCase() === lowered)) return OK;
    }
    return {
      valid: false,
      problem: `Must be one of: ${listPreview(rule.allowed)}`,
      suggestion: closest(value, rule.allowed, options.fuzzyMaxDistance ?? DEFAULT_FUZZY_MAX_DISTANCE),
    };
  },

  date(value: string, rule: DateRule): Check {
    if (DATE_RE.test(value)) return OK;
    return { valid: false, problem: `Invalid date format. Expected ${rule.format ?? DEFAULT_DATE_FORMAT}` };
  },

  time(value: string, rule: TimeRule): Check {
    if (TIME_RE.test(value)) return OK;
    return { valid: false, problem: `Invalid time format. Expected ${rule.format ?? DEFAULT_TIME_FORMAT}` };
  },

  number(value: string, rule: NumberRule): Check {
    const num = parseNumber(value);
    if (num === null) return { valid: false, problem: 'Must be a number' };
    if (rule.min !== undefined && num < rule.min) return { valid: false, problem: `Value must be >= ${rule.min}` };
    if (rule.max !== undefined && num > rule.max) return { valid: false, problem: `Value must be <= ${rule.max}` };
    return OK;
  },

  pattern(value: string, rule: PatternRule): Check {
    if (matchesAtStart(rule.pattern, value.toUpperCase())) return OK;
    return { valid: false, problem: rule.description ?? `Must match pattern: ${rule.pattern.source}` };
  },
};

function applyRule(value: string, rule: FieldRule, options: EngineOptions): Check {
  switch (rule.type) {
    case 'list':
      return validators.list(value, rule, options);
    case 'date':
      return validators.date(value, rule);
    case 'time':
      return validators.time(value, rule);
    case 'number':
      return validators.number(value, rule);
    case 'pattern':
      return validators.pattern(value, rule);
  }
}

/**
 * Validates one cell. Returns undefined for blank cells and passing values.
 */
export function evaluateField(
  column: string,
  rawValue: string,
  rule: FieldRule,
  rowNumber: number,
  options: EngineOptions = {}
): FieldFinding | undefined {
  const value = rawValue.trim();
  if (value === '') return undefined;

  const check = applyRule(value, rule, options);
  if (check.valid) return undefined;

  const finding: FieldFinding = {
    rowNumber,
    column,
    value,
    message: check.problem ?? 'Validation check failed',
    severity: 'error',
  };
  if (check.suggestion !== undefined) finding.suggestion = check.suggestion;
  return finding;
}
