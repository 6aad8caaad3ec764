export type Severity = 'warning' | 'error';
export type RuleType = 'list' | 'date' | 'time' | 'number' | 'pattern';
export type SubjectIdClassification = 'unknown' | 'full_name' | 'invalid_format';

// --------------------------
// Rules
// --------------------------
export interface ListRule {
  readonly type: 'list';
  readonly allowed: readonly string[];
}

export interface DateRule {
  readonly type: 'date';
  readonly format?: string; // label used in the message only
}

export interface TimeRule {
  readonly type: 'time';
  readonly format?: string;
}

export interface NumberRule {
  readonly type: 'number';
  readonly min?: number;
  readonly max?: number;
}

export interface PatternRule {
  readonly type: 'pattern';
  readonly pattern: RegExp;
  readonly description?: string;
}

export type FieldRule = ListRule | DateRule | TimeRule | NumberRule | PatternRule;

export interface Schema {
  readonly columns: readonly string[];
  readonly rules: ReadonlyMap<string, FieldRule>;
}

// --------------------------
// Rows
// --------------------------
/** One parsed input row: column name -> raw cell text. */
export type DataRecord = Readonly<Record<string, string>>;

/** A row the row source could not map onto the header. */
export class MalformedRow {
  constructor(public readonly reason: string) {}
}

export type RowEntry = DataRecord | MalformedRow;

// --------------------------
// Findings & report
// --------------------------
export interface FieldFinding {
  rowNumber: number;
  column: string;
  value: string;
  message: string;
  severity: Severity;
  suggestion?: string;
}

export interface SubjectIdFinding {
  rowNumber: number;
  value: string;
  classification: SubjectIdClassification;
  message: string;
}

export interface HeaderComparison {
  matching: string[];
  missing: string[];
  extra: string[];
  isValid: boolean;
}

export interface SubjectIdSummary {
  unknownCount: number;
  fullNameCount: number;
  invalidFormatCount: number;
  examples: SubjectIdFinding[];
}

export interface ValidationReport {
  headers: HeaderComparison;
  errors: FieldFinding[];
  warnings: FieldFinding[];
  totalRows: number;
  skippedRows: number;
  subjectIds: SubjectIdSummary;
}

export interface EngineOptions {
  fuzzyMaxDistance?: number; // list-rule suggestions; 0 disables
  subjectIdColumn?: string;
  maxSubjectIdExamples?: number;
}
