/**
 * CSV encoding and parsing (RFC 4180 quoting)
 */

export interface CsvRecord {
  fields: string[];
  raw: string; // source text of the record, without its line terminator
}

const UTF8_BOM = '\uFEFF';

/**
 * Escape a single field. Quotes only when the value needs it.
 */
export function escapeCsvField(value: string | null | undefined): string {
  if (!value) return '';
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCsvRow(fields: readonly (string | null | undefined)[]): string {
  return fields.map(escapeCsvField).join(',');
}

export function stripBom(text: string): string {
  return text.startsWith(UTF8_BOM) ? text.slice(1) : text;
}

export function withBom(text: string, bom: boolean): string {
  return bom ? UTF8_BOM + text : text;
}

/**
 * Parse CSV text into records.
 * Handles quoted commas, doubled quotes and line breaks inside quoted fields.
 * A trailing line terminator does not produce an extra record.
 */
export function parseCsv(text: string): CsvRecord[] {
  const records: CsvRecord[] = [];
  let fields: string[] = [];
  let current = '';
  let inQuotes = false;
  let start = 0;
  let i = 0;

  while (i < text.length) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          current += '"';
          i += 2;
        } else {
          inQuotes = false;
          i++;
        }
      } else {
        current += char;
        i++;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
      i++;
    } else if (char === ',') {
      fields.push(current);
      current = '';
      i++;
    } else if (char === '\r' || char === '\n') {
      fields.push(current);
      records.push({ fields, raw: text.slice(start, i) });
      fields = [];
      current = '';
      i += char === '\r' && text[i + 1] === '\n' ? 2 : 1;
      start = i;
    } else {
      current += char;
      i++;
    }
  }

  if (start < text.length) {
    fields.push(current);
    records.push({ fields, raw: text.slice(start) });
  }

  return records;
}
