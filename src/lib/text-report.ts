import dayjs from 'dayjs';
import { errorGroupOf, isPassing, recommendations, subjectIssueCount, summaryVerdict } from './metrics';
import { TIMESTAMP_FORMAT } from './report-json';
import type { ValidationReport } from './types';

const RULE = '='.repeat(60);

const FIXES = {
  'Date Format Issues': { label: 'Date format issue', fix: 'Use format MM/DD/YYYY (e.g., 09/23/2025)' },
  'Time Format Issues': { label: 'Time format issue', fix: 'Use format HH:MM (e.g., 08:21)' },
  'Invalid Dropdown Values': { label: 'Invalid dropdown value', fix: 'Use exact value from dropdown list' },
} as const;

function capped<T>(items: readonly T[], limit: number, render: (item: T) => string, more: (rest: number) => string) {
  const lines = items.slice(0, limit).map(render);
  if (items.length > limit) lines.push(more(items.length - limit));
  return lines;
}

const hasLineBreak = (h: string) => /[\r\n]/.test(h);

/** Issue digest grouped by column and kind, with a suggested fix per group. */
export function renderErrorReport(report: ValidationReport, fileName: string, now: Date): string {
  const lines = ['VALIDATION ERROR REPORT', RULE, `File: ${fileName}`, `Date: ${dayjs(now).format(TIMESTAMP_FORMAT)}`, ''];
  const { missing, extra } = report.headers;

  if (missing.length) {
    lines.push('MISSING HEADERS:');
    lines.push(...capped(missing, 10, (h) => `  - ${h}`, (n) => `  ... and ${n} more`));
    lines.push('');
  }

  if (extra.length) {
    lines.push('EXTRA/MALFORMED HEADERS:');
    lines.push(
      ...capped(
        extra,
        10,
        (h) => (hasLineBreak(h) ? `  - Header has line break: ${JSON.stringify(h).slice(0, 50)}` : `  - ${h}`),
        (n) => `  ... and ${n} more`
      )
    );
    if (extra.some(hasLineBreak)) lines.push('  FIX: Remove line breaks from header row');
    lines.push('');
  }

  if (report.errors.length) {
    const groups = new Map<string, { count: number; example: string; fix: string }>();
    for (const error of report.errors) {
      const group = errorGroupOf(error);
      const known = group === 'Other Validation Issues' ? undefined : FIXES[group];
      const key = `${error.column}: ${known ? known.label : error.message.slice(0, 30)}`;
      const entry = groups.get(key) ?? { count: 0, example: error.value, fix: known ? known.fix : 'Check validation requirements' };
      entry.count++;
      groups.set(key, entry);
    }

    lines.push('DATA VALIDATION ISSUES:');
    for (const [key, info] of [...groups].sort((a, b) => b[1].count - a[1].count)) {
      lines.push(`  ${String(info.count).padStart(3)} × ${key}`);
      lines.push(`       Example: "${info.example}"`);
      lines.push(`       Fix: ${info.fix}`);
    }
    lines.push('');
  }

  lines.push('VALIDATION STATUS:');
  lines.push(isPassing(report) ? '  PASSED - No critical issues' : '  FAILED - Issues must be fixed before submission');
  return lines.join('\n');
}

export function renderDetailedResults(report: ValidationReport, fileName: string): string {
  const lines = ['', RULE, `DETAILED VALIDATION RESULTS: ${fileName}`, RULE];
  const { missing, extra } = report.headers;

  if (missing.length || extra.length) {
    lines.push('', 'HEADER VALIDATION:');
    if (missing.length) {
      lines.push(`  Missing headers (${missing.length}):`);
      lines.push(...capped(missing, 10, (h) => `    - ${h}`, (n) => `    ... and ${n} more`));
    }
    if (extra.length) {
      lines.push(`  Extra headers (${extra.length}):`);
      lines.push(...capped(extra, 10, (h) => `    + ${h}`, (n) => `    ... and ${n} more`));
    }
  }

  if (report.errors.length) {
    lines.push('', `DATA VALIDATION ERRORS (${report.errors.length}):`);
    for (const e of report.errors.slice(0, 20)) {
      lines.push(`  Row ${e.rowNumber}, ${e.column}: ${e.message}`);
      if (e.value) lines.push(`    Value: "${e.value}"`);
    }
    if (report.errors.length > 20) lines.push(`  ... and ${report.errors.length - 20} more errors`);
  }

  if (report.warnings.length) {
    lines.push('', `WARNINGS (${report.warnings.length}):`);
    lines.push(
      ...capped(
        report.warnings,
        10,
        (w) => `  Row ${w.rowNumber}, ${w.column}: ${w.message}`,
        (n) => `  ... and ${n} more warnings`
      )
    );
  }

  const subjectIssues = subjectIssueCount(report);
  if (subjectIssues > 0) {
    const s = report.subjectIds;
    lines.push(
      '',
      `SUBJECT ID ISSUES (${subjectIssues}):`,
      `  Unknown values: ${s.unknownCount}`,
      `  Full names: ${s.fullNameCount}`,
      `  Invalid format: ${s.invalidFormatCount}`
    );
    if (s.examples.length) {
      lines.push('  Examples:');
      for (const ex of s.examples) lines.push(`    Row ${ex.rowNumber}: "${ex.value}" - ${ex.message}`);
    }
  }

  lines.push('', 'RECOMMENDATIONS:');
  lines.push(...recommendations(report).map((r) => `  - ${r}`));
  lines.push('', RULE);
  return lines.join('\n');
}

export function renderSummary(report: ValidationReport, fileName: string): string {
  const lines = ['', `  Summary for ${fileName}:`];
  const subjectIssues = subjectIssueCount(report);
  if (report.headers.missing.length) lines.push(`    Missing ${report.headers.missing.length} required headers`);
  if (report.errors.length) lines.push(`    ${report.errors.length} data errors found`);
  if (subjectIssues > 0) lines.push(`    ${subjectIssues} subject ID issues`);

  const verdict = summaryVerdict(report);
  if (verdict === 'passed') lines.push('    PASSED - File meets all requirements');
  else if (verdict === 'failed') lines.push('    FAILED - Critical issues found');
  else lines.push('    PASSED WITH WARNINGS');
  return lines.join('\n');
}

export interface RunSummary {
  validationRun: string;
  totalFiles: number;
  passed: number;
  failed: number;
  filesProcessed: string[];
  templateInfo: { headers: number; validationRules: number };
}

export function renderRunSummary(summary: RunSummary, outputDir: string): string {
  const lines = [RULE, 'VALIDATION COMPLETE', RULE, `Processed ${summary.totalFiles} file(s)`];
  if (summary.passed > 0) lines.push(`${summary.passed} file(s) passed validation`);
  if (summary.failed > 0) lines.push(`${summary.failed} file(s) failed validation`);
  lines.push('', `Results saved in '${outputDir}' folder`);
  return lines.join('\n');
}
