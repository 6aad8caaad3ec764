// Row sources for CSV and XLSX files

import * as fs from 'fs';
import * as path from 'path';
import { parse as csvParse } from 'csv-parse/sync';
import * as XLSX from 'xlsx';
import { z } from 'zod';
import type { DataRecord, RowEntry } from './types';

export type FileType = 'csv' | 'xlsx';

export interface DataFile {
  fileName: string;
  fileType: FileType;
  header: string[];
  rows: RowEntry[];
}

const CellGrid = z.array(z.array(z.string()));

export function inferType(filename: string): FileType | null {
  const ext = filename.split('.').pop()?.toLowerCase();
  if (ext === 'csv') return 'csv';
  if (ext === 'xlsx' || ext === 'xls') return 'xlsx';
  return null;
}

/**
 * Maps cell arrays onto the header. Short rows leave trailing columns absent;
 * cells past the last header (a trailing comma, stray notes) have no column and are dropped.
 */
export function toRowEntries(header: readonly string[], body: readonly (readonly string[])[]): DataRecord[] {
  return body.map((cells) => Object.fromEntries(cells.slice(0, header.length).map((cell, i) => [header[i], cell])));
}

export function parseCsvText(text: string): { header: string[]; rows: RowEntry[] } {
  const grid = CellGrid.parse(
    csvParse(text, { bom: true, skip_empty_lines: true, relax_column_count: true })
  );
  const [header = [], ...body] = grid;
  return { header, rows: toRowEntries(header, body) };
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

function readCsv(filePath: string) {
  let text: string;
  try {
    text = utf8.decode(fs.readFileSync(filePath));
  } catch (e) {
    throw new Error(`File is not valid UTF-8: ${path.basename(filePath)}`, { cause: e });
  }
  return parseCsvText(text);
}

function readXlsx(filePath: string) {
  const workbook = XLSX.read(fs.readFileSync(filePath), { type: 'buffer', cellDates: true });

  const sheetName = workbook.SheetNames[0];
  const worksheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!worksheet) throw new Error('No sheets found in workbook');

  const data = XLSX.utils.sheet_to_json<unknown[]>(worksheet, { header: 1, raw: false, defval: '', blankrows: false });
  const grid = data.map((row) => row.map((v) => (v === null || v === undefined ? '' : String(v))));
  const [header = [], ...body] = grid;
  return { header, rows: toRowEntries(header, body) };
}

export function readDataFile(filePath: string): DataFile {
  const fileName = path.basename(filePath);
  const fileType = inferType(fileName);
  if (!fileType) throw new Error(`Unsupported file type: ${fileName}`);

  const { header, rows } = fileType === 'csv' ? readCsv(filePath) : readXlsx(filePath);
  return { fileName, fileType, header, rows };
}
