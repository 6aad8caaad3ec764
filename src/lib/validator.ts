import { compareHeaders } from './headers';
import { evaluateField } from './rules-engine';
import { classifySubjectId, SUBJECT_ID_COLUMN } from './subject-id';
import {
  MalformedRow,
  type DataRecord,
  type EngineOptions,
  type FieldFinding,
  type HeaderComparison,
  type RowEntry,
  type Schema,
  type SubjectIdClassification,
  type SubjectIdFinding,
  type ValidationReport,
} from './types';

export const FIRST_DATA_ROW = 2; // row 1 is the header
export const DEFAULT_MAX_SUBJECT_ID_EXAMPLES = 5;

/** Append-only list that silently stops growing at `capacity`. */
export class BoundedList<T> {
  private readonly items: T[] = [];

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 0) throw new RangeError(`Invalid capacity: ${capacity}`);
  }

  /** @returns whether the item was kept */
  push(item: T): boolean {
    if (this.items.length >= this.capacity) return false;
    this.items.push(item);
    return true;
  }

  get length() {
    return this.items.length;
  }

  toArray(): T[] {
    return [...this.items];
  }
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return value;
}

function structuralProblem(record: DataRecord): string | undefined {
  if (record === null || typeof record !== 'object' || Array.isArray(record)) return 'row is not a column mapping';
  for (const [column, value] of Object.entries<unknown>(record)) {
    if (typeof value !== 'string') return `column "${column}" has a non-text value`;
  }
  return undefined;
}

/**
 * Accumulates findings for one file. Rows are fed in file order; `finalize` freezes the result.
 * One builder per file; the schema may be shared between builders.
 */
export class ReportBuilder {
  private readonly headers: HeaderComparison;
  private readonly headerRow: string[];
  private readonly subjectIdColumn: string;
  private readonly errors: FieldFinding[] = [];
  private readonly warnings: FieldFinding[] = [];
  private readonly examples: BoundedList<SubjectIdFinding>;
  private readonly counts: Record<SubjectIdClassification, number> = { unknown: 0, full_name: 0, invalid_format: 0 };
  private nextRowNumber = FIRST_DATA_ROW;
  private totalRows = 0;
  private skippedRows = 0;
  private report: ValidationReport | null = null;

  constructor(
    private readonly schema: Schema,
    headerRow: readonly string[],
    private readonly options: EngineOptions = {}
  ) {
    this.headers = compareHeaders(schema.columns, headerRow);
    this.headerRow = Array.from(new Set(headerRow));
    this.subjectIdColumn = options.subjectIdColumn ?? SUBJECT_ID_COLUMN;
    this.examples = new BoundedList(options.maxSubjectIdExamples ?? DEFAULT_MAX_SUBJECT_ID_EXAMPLES);
  }

  addRow(entry: RowEntry): void {
    if (this.report) throw new Error('Report already finalized');
    const rowNumber = this.nextRowNumber++;

    const problem = entry instanceof MalformedRow ? entry.reason : structuralProblem(entry);
    if (problem !== undefined || entry instanceof MalformedRow) {
      this.skippedRows++;
      this.warnings.push({ rowNumber, column: '*', value: '', message: `Row skipped: ${problem}`, severity: 'warning' });
      return;
    }

    this.totalRows++;

    for (const column of this.columnsOf(entry)) {
      const rule = this.schema.rules.get(column);
      if (!rule) continue;
      const finding = evaluateField(column, entry[column], rule, rowNumber, this.options);
      if (!finding) continue;
      if (finding.severity === 'error') this.errors.push(finding);
      else this.warnings.push(finding);
    }

    if (Object.hasOwn(entry, this.subjectIdColumn)) {
      const finding = classifySubjectId(entry[this.subjectIdColumn], rowNumber);
      if (finding) {
        this.counts[finding.classification]++;
        this.examples.push(finding);
      }
    }
  }

  finalize(): ValidationReport {
    if (!this.report) {
      this.report = deepFreeze({
        headers: this.headers,
        errors: [...this.errors],
        warnings: [...this.warnings],
        totalRows: this.totalRows,
        skippedRows: this.skippedRows,
        subjectIds: {
          unknownCount: this.counts.unknown,
          fullNameCount: this.counts.full_name,
          invalidFormatCount: this.counts.invalid_format,
          examples: this.examples.toArray(),
        },
      });
    }
    return this.report;
  }

  // Header order first, then any keys the row carries beyond the header.
  private columnsOf(record: DataRecord): string[] {
    const fromHeader = this.headerRow.filter((c) => Object.hasOwn(record, c));
    const known = new Set(this.headerRow);
    return fromHeader.concat(Object.keys(record).filter((c) => !known.has(c)));
  }
}

/** Batch form: validate a whole file's rows against a schema. */
export function validate(
  schema: Schema,
  headerRow: readonly string[],
  rows: Iterable<RowEntry>,
  options: EngineOptions = {}
): ValidationReport {
  const builder = new ReportBuilder(schema, headerRow, options);
  for (const row of rows) builder.addRow(row);
  return builder.finalize();
}
