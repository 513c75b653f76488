import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'csv-parse/sync';
import { KeyTable } from '../types';
import { KEY_TABLE_SIZE, validateKeyTable } from './validators';

/** Reads a key table from a .csv or .json file. */
export function loadKeyFile(filePath: string): KeyTable {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Key file not found at ${filePath}`);
  }
  const raw = fs.readFileSync(filePath, 'utf8');
  const source = path.basename(filePath);
  switch (path.extname(filePath).toLowerCase()) {
    case '.csv':
      return parseKeyCsv(raw, source);
    case '.json':
      return parseKeyJson(raw, source);
    default:
      throw new Error(`Unsupported key file '${source}': expected .csv or .json`);
  }
}

/** Strings are hexadecimal, with or without a 0x prefix. */
export function parseKeyValue(value: unknown, source: string, entry: number): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && /^(0x)?[0-9a-f]{1,4}$/i.test(value.trim())) {
    return parseInt(value.trim().replace(/^0x/i, ''), 16);
  }
  throw new RangeError(`${source}: entry ${entry} is not a 16-bit value (${String(value)})`);
}

function parseIndex(value: string, source: string, row: number): number {
  const trimmed = value.trim();
  const index = /^0x/i.test(trimmed) ? parseInt(trimmed.slice(2), 16) : Number(trimmed);
  if (!Number.isInteger(index) || index < 0 || index >= KEY_TABLE_SIZE) {
    throw new RangeError(`${source}: row ${row} has an invalid index '${value}'`);
  }
  return index;
}

/**
 * Expects a header row with a `value` (or `key`) column. An `index` column,
 * when present, places each value; otherwise rows are taken in order.
 */
export function parseKeyCsv(raw: string, source = 'key.csv'): KeyTable {
  const records: Record<string, string>[] = parse(raw, {
    columns: (header: string[]) => header.map((column) => column.trim().toLowerCase()),
    skip_empty_lines: true,
    comment: '#',
    trim: true,
  });

  const values: unknown[] = [];
  const seen = new Set<number>();
  records.forEach((record, row) => {
    const cell = record['value'] ?? record['key'];
    if (cell === undefined) {
      throw new Error(`${source}: missing 'value' column`);
    }
    const index = record['index'] !== undefined ? parseIndex(record['index'], source, row + 1) : row;
    if (seen.has(index)) {
      throw new RangeError(`${source}: index ${index} appears more than once`);
    }
    seen.add(index);
    values[index] = parseKeyValue(cell, source, index);
  });

  const key = Array.from(values);
  validateKeyTable(key, source);
  return key;
}

/** Accepts a bare array or an object with a `key` array. */
export function parseKeyJson(raw: string, source = 'key.json'): KeyTable {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new Error(`${source}: invalid JSON: ${msg}`);
  }
  const entries: unknown[] | null = Array.isArray(json) ? json : isKeyObject(json) ? json.key : null;
  if (!entries) {
    throw new Error(`${source}: expected an array or an object with a "key" array`);
  }
  const key = entries.map((value, i) => parseKeyValue(value, source, i));
  validateKeyTable(key, source);
  return key;
}

function isKeyObject(json: unknown): json is { key: unknown[] } {
  return typeof json === 'object' && json !== null && 'key' in json && Array.isArray(json.key);
}
