import * as fs from 'fs';
import * as path from 'path';
import dayjs from 'dayjs';
import { isPassing } from './metrics';
import type { FieldFinding, Severity, SubjectIdClassification, ValidationReport } from './types';

export const TIMESTAMP_FORMAT = 'YYYY-MM-DDTHH:mm:ss';
export const FILE_STAMP_FORMAT = 'YYYYMMDD_HHmmss';

interface FindingDoc {
  row: number;
  column: string;
  value: string;
  error: string;
  severity: Severity;
  suggestion?: string;
}

export interface ResultDocument {
  file: string;
  timestamp: string;
  status: 'PASSED' | 'FAILED';
  header_validation: { matching: string[]; missing: string[]; extra: string[]; is_valid: boolean };
  data_validation: { errors: FindingDoc[]; warnings: FindingDoc[]; total_rows: number; skipped_rows: number };
  subject_id_validation: {
    unknown_count: number;
    name_count: number;
    invalid_count: number;
    examples: Array<{ row: number; value: string; type: SubjectIdClassification; error: string }>;
  };
}

function findingDoc(f: FieldFinding): FindingDoc {
  const doc: FindingDoc = { row: f.rowNumber, column: f.column, value: f.value, error: f.message, severity: f.severity };
  if (f.suggestion !== undefined) doc.suggestion = f.suggestion;
  return doc;
}

/** Structured export of a report; the timestamp belongs to the export, not the report. */
export function toResultDocument(report: ValidationReport, fileName: string, now: Date): ResultDocument {
  const { headers, subjectIds } = report;
  return {
    file: fileName,
    timestamp: dayjs(now).format(TIMESTAMP_FORMAT),
    status: isPassing(report) ? 'PASSED' : 'FAILED',
    header_validation: {
      matching: [...headers.matching],
      missing: [...headers.missing],
      extra: [...headers.extra],
      is_valid: headers.isValid,
    },
    data_validation: {
      errors: report.errors.map(findingDoc),
      warnings: report.warnings.map(findingDoc),
      total_rows: report.totalRows,
      skipped_rows: report.skippedRows,
    },
    subject_id_validation: {
      unknown_count: subjectIds.unknownCount,
      name_count: subjectIds.fullNameCount,
      invalid_count: subjectIds.invalidFormatCount,
      examples: subjectIds.examples.map((e) => ({ row: e.rowNumber, value: e.value, type: e.classification, error: e.message })),
    },
  };
}

export function defaultResultsPath(outputDir: string, fileName: string, now: Date): string {
  const stem = path.parse(fileName).name;
  return path.join(outputDir, `${stem}_validation_${dayjs(now).format(FILE_STAMP_FORMAT)}.json`);
}

export function saveResults(doc: ResultDocument, outputPath: string): string {
  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  fs.writeFileSync(outputPath, JSON.stringify(doc, null, 2));
  return outputPath;
}
