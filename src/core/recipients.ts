import { parse } from 'csv-parse/sync';
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { RecipientRow } from './campaign.js';
import { ValidationError, errorMessage } from './errors.js';

const tableSchema = z.array(z.array(z.string()));

/**
 * Parse recipient CSV text. The first line holds the column names and one of
 * them must be `email` (any case). Short rows are padded with empty cells.
 */
export function parseRecipients(text: string): RecipientRow[] {
  let records: unknown;
  try {
    records = parse(text, { bom: true, skip_empty_lines: true, relax_column_count: true, trim: true });
  } catch (err) {
    throw new ValidationError(`CSV parsing error: ${errorMessage(err)}`);
  }
  const table = tableSchema.safeParse(records);
  if (!table.success || table.data.length === 0) {
    throw new ValidationError('CSV file appears to be empty or has no headers.');
  }

  const [header, ...data] = table.data;
  if (!header.some((h) => h.toLowerCase() === 'email')) {
    throw new ValidationError(`CSV is missing an 'email' column. Found columns: ${header.join(', ')}`);
  }
  return data.map((cells) => {
    const row: RecipientRow = {};
    header.forEach((name, i) => {
      if (name) row[name] = cells[i] ?? '';
    });
    return row;
  });
}

export async function loadRecipients(file: string) {
  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch {
    throw new ValidationError(`File not found: ${file}`);
  }
  const rows = parseRecipients(text);
  if (rows.length === 0) throw new ValidationError('CSV has headers but no data rows.');
  return rows;
}
