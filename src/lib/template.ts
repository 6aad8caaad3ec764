// Template files: { headers: string[], validations: { [column]: { type, ... } } }
import * as fs from 'fs';
import dayjs from 'dayjs';
import { z } from 'zod';
import { createSchema, SchemaError } from './schema';
import type { FieldRule, Schema } from './types';

const ValidationEntrySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('list'), values: z.array(z.string()).min(1) }),
  z.object({ type: z.literal('date'), format: z.string().optional() }),
  z.object({ type: z.literal('time'), format: z.string().optional() }),
  z.object({ type: z.literal('number'), min: z.number().optional(), max: z.number().optional() }),
  z.object({ type: z.literal('pattern'), pattern: z.string().min(1), description: z.string().optional() }),
]);
export type ValidationEntry = z.infer<typeof ValidationEntrySchema>;

export const TemplateSchema = z.object({
  headers: z.array(z.string()),
  validations: z.record(ValidationEntrySchema).default({}),
});
export type TemplateDocument = z.infer<typeof TemplateSchema>;

export interface TemplateSnapshot extends TemplateDocument {
  totalHeaders: number;
  totalValidations: number;
  source: string;
  convertedDate: string;
}

function toRule(column: string, entry: ValidationEntry): FieldRule {
  switch (entry.type) {
    case 'list':
      return { type: 'list', allowed: entry.values };
    case 'date':
    case 'time':
      return entry.format === undefined ? { type: entry.type } : { type: entry.type, format: entry.format };
    case 'number':
      return { type: 'number', min: entry.min, max: entry.max };
    case 'pattern': {
      let pattern: RegExp;
      try {
        pattern = new RegExp(entry.pattern);
      } catch (e) {
        throw new SchemaError('Invalid template', [`${column}: ${e instanceof Error ? e.message : String(e)}`]);
      }
      return { type: 'pattern', pattern, description: entry.description };
    }
  }
}

function toEntry(rule: FieldRule): ValidationEntry {
  switch (rule.type) {
    case 'list':
      return { type: 'list', values: [...rule.allowed] };
    case 'date':
    case 'time':
      return rule.format === undefined ? { type: rule.type } : { type: rule.type, format: rule.format };
    case 'number':
      return { type: 'number', min: rule.min, max: rule.max };
    case 'pattern':
      return { type: 'pattern', pattern: rule.pattern.source, description: rule.description };
  }
}

/** Validates a decoded template document and builds the schema. */
export function parseTemplate(input: unknown): Schema {
  const parsed = TemplateSchema.safeParse(input);
  if (!parsed.success) {
    throw new SchemaError(
      'Invalid template',
      parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
    );
  }
  const { headers, validations } = parsed.data;
  return createSchema(
    headers,
    Object.entries(validations).map(([column, entry]) => [column, toRule(column, entry)] as const)
  );
}

export function loadTemplate(templatePath: string): Schema {
  let text: string;
  try {
    text = fs.readFileSync(templatePath, 'utf-8');
  } catch (e) {
    throw new SchemaError(`Template file not found: ${templatePath}`, [e instanceof Error ? e.message : String(e)]);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (e) {
    throw new SchemaError(`Template is not valid JSON: ${templatePath}`, [e instanceof Error ? e.message : String(e)]);
  }
  return parseTemplate(json);
}

export function exportTemplate(schema: Schema, source: string, now: Date): TemplateSnapshot {
  const validations: Record<string, ValidationEntry> = {};
  for (const [column, rule] of schema.rules) validations[column] = toEntry(rule);
  return {
    headers: [...schema.columns],
    validations,
    totalHeaders: schema.columns.length,
    totalValidations: schema.rules.size,
    source,
    convertedDate: dayjs(now).format('YYYY-MM-DDTHH:mm:ss'),
  };
}

export function saveTemplate(snapshot: TemplateSnapshot, outputPath: string): string {
  fs.writeFileSync(outputPath, JSON.stringify(snapshot, null, 2));
  return outputPath;
}
