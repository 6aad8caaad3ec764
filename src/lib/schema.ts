import type { FieldRule, Schema } from './types';

/** Raised for template/schema problems; always fatal for a run. */
export class SchemaError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'SchemaError';
  }
}

function checkRule(column: string, rule: FieldRule): string[] {
  switch (rule.type) {
    case 'list':
      return rule.allowed.length === 0 ? [`${column}: list rule has no allowed values`] : [];
    case 'number': {
      const problems: string[] = [];
      if (rule.min !== undefined && !Number.isFinite(rule.min)) problems.push(`${column}: min must be a finite number`);
      if (rule.max !== undefined && !Number.isFinite(rule.max)) problems.push(`${column}: max must be a finite number`);
      if (rule.min !== undefined && rule.max !== undefined && rule.min > rule.max) {
        problems.push(`${column}: min (${rule.min}) is greater than max (${rule.max})`);
      }
      return problems;
    }
    case 'date':
    case 'time':
    case 'pattern':
      return [];
  }
}

function isRuleIterable(
  rules: Iterable<readonly [string, FieldRule]> | Readonly<Record<string, FieldRule>>
): rules is Iterable<readonly [string, FieldRule]> {
  return Symbol.iterator in rules;
}

function freezeRule(rule: FieldRule): FieldRule {
  if (rule.type === 'list') return Object.freeze({ ...rule, allowed: Object.freeze([...rule.allowed]) });
  return Object.freeze({ ...rule });
}

/**
 * Builds the immutable schema shared by every validation run.
 * Rules may name columns outside `columns`; those are still validated when present in the data.
 */
export function createSchema(
  columns: readonly string[],
  rules: Iterable<readonly [string, FieldRule]> | Readonly<Record<string, FieldRule>> = {}
): Schema {
  const problems: string[] = [];

  const seen = new Set<string>();
  for (const c of columns) {
    if (seen.has(c)) problems.push(`duplicate column "${c}"`);
    seen.add(c);
  }

  const entries = isRuleIterable(rules) ? Array.from(rules) : Object.entries(rules);

  const ruleMap = new Map<string, FieldRule>();
  for (const [column, rule] of entries) {
    problems.push(...checkRule(column, rule));
    ruleMap.set(column, freezeRule(rule));
  }

  if (problems.length) throw new SchemaError('Invalid schema', problems);

  return Object.freeze({
    columns: Object.freeze([...columns]),
    rules: new ReadonlyRuleMap(ruleMap),
  });
}

// Map whose mutators are unreachable once constructed.
class ReadonlyRuleMap implements ReadonlyMap<string, FieldRule> {
  readonly #inner: Map<string, FieldRule>;

  constructor(inner: Map<string, FieldRule>) {
    this.#inner = inner;
    Object.freeze(this);
  }

  get size() { return this.#inner.size; }
  get(key: string) { return this.#inner.get(key); }
  has(key: string) { return this.#inner.has(key); }
  forEach(cb: (value: FieldRule, key: string, map: ReadonlyMap<string, FieldRule>) => void) {
    this.#inner.forEach((v, k) => cb(v, k, this));
  }
  keys() { return this.#inner.keys(); }
  values() { return this.#inner.values(); }
  entries() { return this.#inner.entries(); }
  [Symbol.iterator]() { return this.#inner[Symbol.iterator](); }
}
