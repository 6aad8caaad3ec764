#!/usr/bin/env node
import { config } from 'dotenv';
config();

import * as fs from 'fs';
import * as path from 'path';
import { Command } from 'commander';
import * as logger from 'firebase-functions/logger';
import { runBatch } from './lib/batch';
import { loadConfig } from './lib/config';
import { renderDashboard, saveDashboard } from './lib/dashboard';
import { readDataFile } from './lib/file-reader';
import { isPassing } from './lib/metrics';
import { defaultResultsPath, saveResults, toResultDocument } from './lib/report-json';
import { SchemaError } from './lib/schema';
import { exportTemplate, loadTemplate, saveTemplate } from './lib/template';
import { renderDetailedResults, renderSummary } from './lib/text-report';
import { validate } from './lib/validator';

const packageJson: { version: string } = JSON.parse(fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf-8'));

interface CliOptions {
  template: string;
  input: string;
  output: string;
  results?: string;
  extractOnly?: boolean;
  summaryOnly?: boolean;
  dashboard: boolean;
}

export const EXIT_CONFIG_ERROR = 1;
export const EXIT_VALIDATION_FAILED = 2;

function run(file: string | undefined, opts: CliOptions): number {
  const cfg = loadConfig();
  const engine = { fuzzyMaxDistance: cfg.fuzzyMaxDistance };

  if (opts.extractOnly) {
    const schema = loadTemplate(opts.template);
    fs.mkdirSync(opts.output, { recursive: true });
    const out = saveTemplate(exportTemplate(schema, opts.template, new Date()), path.join(opts.output, 'template_data.json'));
    logger.info('Template extraction complete', { output: out });
    return 0;
  }

  if (file) {
    const schema = loadTemplate(opts.template);
    const data = readDataFile(file);
    const report = validate(schema, data.header, data.rows, engine);
    const now = new Date();
    const resultsPath = saveResults(
      toResultDocument(report, data.fileName, now),
      opts.results ?? defaultResultsPath(opts.output, data.fileName, now)
    );
    logger.info('Results saved', { output: resultsPath });
    if (opts.dashboard) saveDashboard(renderDashboard(report, data.fileName, now), opts.output, data.fileName);
    console.log(opts.summaryOnly ? renderSummary(report, data.fileName) : renderDetailedResults(report, data.fileName));
    return isPassing(report) ? 0 : EXIT_VALIDATION_FAILED;
  }

  const result = runBatch({
    templatePath: opts.template,
    inputDir: opts.input,
    outputDir: opts.output,
    dashboard: opts.dashboard,
    summaryOnly: opts.summaryOnly,
    engine,
  });
  if (result.status !== 'completed') return 0;
  return result.summary.failed > 0 || result.failures.length > 0 ? EXIT_VALIDATION_FAILED : 0;
}

export function buildProgram(): Command {
  const cfg = loadConfig();
  const program = new Command();
  program
    .name('tabcheck')
    .description('Validate CSV/XLSX data files against a column template')
    .version(packageJson.version)
    .argument('[file]', 'Validate a single file instead of the whole input folder')
    .option('-t, --template <path>', 'Path to the JSON template', cfg.templatePath)
    .option('-i, --input <dir>', 'Folder scanned for data files', cfg.inputDir)
    .option('-o, --output <dir>', 'Folder for results', cfg.outputDir)
    .option('-r, --results <path>', 'Results file for single-file mode')
    .option('--extract-only', 'Only load the template and write its snapshot')
    .option('--summary-only', 'Print only the summary per file')
    .option('--no-dashboard', 'Skip the HTML dashboard')
    .action((file: string | undefined, opts: CliOptions) => {
      try {
        process.exitCode = run(file, opts);
      } catch (e) {
        const message = e instanceof Error ? e.message : String(e);
        logger.error('Validation run failed', { error: message });
        process.exitCode = e instanceof SchemaError ? EXIT_CONFIG_ERROR : EXIT_VALIDATION_FAILED;
      }
    });
  return program;
}

if (require.main === module) {
  buildProgram().parse(process.argv);
}
