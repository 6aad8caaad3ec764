/*
  Folder run: validate every CSV/XLSX in the input folder against one template.
  Per file: {stem}_validation.json, {stem}_dashboard.html, {stem}_report.txt in the output folder.
  Per run:  validation_summary_{YYYYMMDD_HHmmss}.json
*/

import * as fs from 'fs';
import * as path from 'path';
import * as logger from 'firebase-functions/logger';
import dayjs from 'dayjs';
import { renderDashboard, saveDashboard } from './dashboard';
import { readDataFile, inferType } from './file-reader';
import { isPassing } from './metrics';
import { FILE_STAMP_FORMAT, saveResults, TIMESTAMP_FORMAT, toResultDocument } from './report-json';
import { loadTemplate } from './template';
import { renderDetailedResults, renderErrorReport, renderRunSummary, renderSummary, type RunSummary } from './text-report';
import type { EngineOptions, ValidationReport } from './types';
import { validate } from './validator';

export interface BatchOptions {
  templatePath: string;
  inputDir: string;
  outputDir: string;
  dashboard?: boolean;
  summaryOnly?: boolean;
  engine?: EngineOptions;
  now?: () => Date;
  write?: (text: string) => void;
}

export interface FileOutcome {
  fileName: string;
  report: ValidationReport;
  passed: boolean;
  outputs: string[];
}

export type BatchResult =
  | { status: 'input-created' | 'no-files'; inputDir: string }
  | {
      status: 'completed';
      summary: RunSummary;
      summaryPath: string;
      files: FileOutcome[];
      failures: Array<{ fileName: string; error: string }>;
    };

export function listDataFiles(inputDir: string): string[] {
  return fs
    .readdirSync(inputDir, { withFileTypes: true })
    .filter((d) => d.isFile() && inferType(d.name) !== null)
    .map((d) => d.name)
    .sort();
}

export function runBatch(options: BatchOptions): BatchResult {
  const now = options.now ?? (() => new Date());
  const write = options.write ?? ((text: string) => process.stdout.write(`${text}\n`));
  const { inputDir, outputDir } = options;

  if (!fs.existsSync(inputDir)) {
    fs.mkdirSync(inputDir, { recursive: true });
    logger.warn('Created input folder; place data files there and run again', { inputDir });
    return { status: 'input-created', inputDir };
  }
  fs.mkdirSync(outputDir, { recursive: true });

  const fileNames = listDataFiles(inputDir);
  if (fileNames.length === 0) {
    logger.warn('No CSV or XLSX files found', { inputDir });
    return { status: 'no-files', inputDir };
  }

  // Template problems abort the whole run.
  const schema = loadTemplate(options.templatePath);
  logger.info('Loaded template', { headers: schema.columns.length, validations: schema.rules.size });

  const files: FileOutcome[] = [];
  const failures: Array<{ fileName: string; error: string }> = [];

  for (const name of fileNames) {
    try {
      const data = readDataFile(path.join(inputDir, name));
      const report = validate(schema, data.header, data.rows, options.engine);
      const stamp = now();
      const stem = path.parse(name).name;

      const outputs = [saveResults(toResultDocument(report, name, stamp), path.join(outputDir, `${stem}_validation.json`))];
      if (options.dashboard !== false) outputs.push(saveDashboard(renderDashboard(report, name, stamp), outputDir, name));
      const reportPath = path.join(outputDir, `${stem}_report.txt`);
      fs.writeFileSync(reportPath, renderErrorReport(report, name, stamp));
      outputs.push(reportPath);

      logger.info('Validated file', {
        file: name,
        rows: report.totalRows,
        errors: report.errors.length,
        warnings: report.warnings.length,
      });
      write(options.summaryOnly ? renderSummary(report, name) : renderDetailedResults(report, name));
      files.push({ fileName: name, report, passed: isPassing(report), outputs });
    } catch (e) {
      const error = e instanceof Error ? e.message : String(e);
      logger.error('Error processing file', { file: name, error });
      failures.push({ fileName: name, error });
    }
  }

  const runAt = now();
  const passed = files.filter((f) => f.passed).length;
  const summary: RunSummary = {
    validationRun: dayjs(runAt).format(TIMESTAMP_FORMAT),
    totalFiles: files.length,
    passed,
    failed: files.length - passed,
    filesProcessed: files.map((f) => f.fileName),
    templateInfo: { headers: schema.columns.length, validationRules: schema.rules.size },
  };

  const summaryPath = path.join(outputDir, `validation_summary_${dayjs(runAt).format(FILE_STAMP_FORMAT)}.json`);
  fs.writeFileSync(summaryPath, JSON.stringify(summary, null, 2));
  write(renderRunSummary(summary, outputDir));
  write(`Summary report: ${summaryPath}`);

  return { status: 'completed', summary, summaryPath, files, failures };
}
