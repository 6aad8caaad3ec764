export * from './lib/types';
export { createSchema, SchemaError } from './lib/schema';
export { compareHeaders } from './lib/headers';
export { evaluateField, parseNumber } from './lib/rules-engine';
export { classifySubjectId, SUBJECT_ID_COLUMN, SUBJECT_ID_MESSAGES } from './lib/subject-id';
export { BoundedList, ReportBuilder, validate } from './lib/validator';
export { loadTemplate, parseTemplate, exportTemplate, saveTemplate } from './lib/template';
export type { TemplateDocument, TemplateSnapshot } from './lib/template';
export { readDataFile, parseCsvText } from './lib/file-reader';
export * from './lib/metrics';
export { toResultDocument, saveResults } from './lib/report-json';
export type { ResultDocument } from './lib/report-json';
export { renderDashboard } from './lib/dashboard';
export { renderErrorReport, renderDetailedResults, renderSummary } from './lib/text-report';
export { runBatch } from './lib/batch';
export type { BatchOptions, BatchResult } from './lib/batch';
