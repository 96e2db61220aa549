/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * CSV codec for tour listing files
 *
 * Quoted fields may contain the delimiter, doubled quotes and line breaks.
 * Cell text is kept verbatim (no trimming), so a file read and written back
 * keeps every untouched value intact.
 */

import type { CsvRow, CsvTable } from './types.js';

export interface CsvParseOptions {
  /** Delimiter character (default: ',') */
  delimiter?: string;
}

export interface CsvFormatOptions {
  /** Delimiter character (default: ',') */
  delimiter?: string;
}

/**
 * Parse CSV content with a header row into a table.
 * Blank lines are skipped; short rows are padded with empty cells.
 */
export function parseCsv(content: string, options: CsvParseOptions = {}): CsvTable {
  const delimiter = options.delimiter ?? ',';
  const text = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
  const records = parseRecords(text, delimiter);

  if (records.length === 0) {
    return { headers: [], rows: [] };
  }

  const headers = records[0];
  const rows: CsvRow[] = [];

  for (let i = 1; i < records.length; i++) {
    const values = records[i];
    const row: CsvRow = {};
    for (let j = 0; j < headers.length; j++) {
      row[headers[j]] = values[j] ?? '';
    }
    rows.push(row);
  }

  return { headers, rows };
}

function parseRecords(text: string, delimiter: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let current = '';
  let inQuotes = false;

  const endRecord = () => {
    record.push(current);
    // Blank line
    if (!(record.length === 1 && record[0] === '')) {
      records.push(record);
    }
    record = [];
    current = '';
  };

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          // Escaped quote
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += char;
      }
    } else if (char === '"' && current === '') {
      // Opening quote; a quote inside an unquoted field is literal
      inQuotes = true;
    } else if (char === delimiter) {
      record.push(current);
      current = '';
    } else if (char === '\r') {
      if (text[i + 1] === '\n') i++;
      endRecord();
    } else if (char === '\n') {
      endRecord();
    } else {
      current += char;
    }
  }

  if (current !== '' || record.length > 0) {
    endRecord();
  }

  return records;
}

/**
 * Serialize a table back to CSV text, header first, newline-terminated.
 */
export function formatCsv(table: CsvTable, options: CsvFormatOptions = {}): string {
  const delimiter = options.delimiter ?? ',';

  const csvEscape = (val: string | undefined): string => {
    if (val === undefined) return '';
    if (val.includes(delimiter) || val.includes('"') || val.includes('\n') || val.includes('\r')) {
      return `"${val.replace(/"/g, '""')}"`;
    }
    return val;
  };

  const lines = [table.headers.map(csvEscape).join(delimiter)];
  for (const row of table.rows) {
    lines.push(table.headers.map((h) => csvEscape(row[h])).join(delimiter));
  }

  return `${lines.join('\n')}\n`;
}
