/**
 * CSV Writer / Translator
 * Serializes ordered parameter records and swaps raw group ids for display labels
 */

import { readFileSync, writeFileSync } from 'fs';
import { CSV_HEADER } from './constants';
import { formatCsvRow, parseCsv, stripBom, withBom } from './csv';
import type {
  CsvFileOptions,
  GroupMapping,
  ParameterRecord,
  TranslateMode,
} from './types';

const LINE_TERMINATORS = { crlf: '\r\n', lf: '\n' } as const;

export function buildCsvLines(
  records: readonly ParameterRecord[],
  translate?: GroupMapping
): string[] {
  const lines = [CSV_HEADER.join(',')];

  for (const record of records) {
    lines.push(
      formatCsvRow([
        translate?.get(record.group) ?? record.group,
        record.name,
        record.value,
        record.descriptionField,
        record.imageField,
        record.isInstance ? 'True' : 'False',
      ])
    );
  }

  return lines;
}

/**
 * Write lines as UTF-8, each followed by the configured terminator
 */
export function writeCsvFile(
  filePath: string,
  lines: readonly string[],
  options: CsvFileOptions
): void {
  const eol = LINE_TERMINATORS[options.lineEnding];
  const body = lines.map(line => line + eol).join('');
  writeFileSync(filePath, withBom(body, options.bom), 'utf-8');
}

/**
 * Rewrite the group column of an already written report in place.
 * Records whose group has no mapping are written back unchanged.
 *
 * @returns number of records whose group was translated
 */
export function translateCsvGroups(
  filePath: string,
  mapping: GroupMapping,
  options: CsvFileOptions
): number {
  const records = parseCsv(stripBom(readFileSync(filePath, 'utf-8')));
  let translated = 0;

  const lines = records.map((record, index) => {
    // Header
    if (index === 0) return record.raw;

    const label = mapping.get(record.fields[0]);
    if (label === undefined) return record.raw;

    translated++;
    return formatCsvRow([label, ...record.fields.slice(1)]);
  });

  writeCsvFile(filePath, lines, options);
  return translated;
}

/**
 * Write the full report. In two-pass mode the raw group ids are written first and
 * translated afterwards; single-pass resolves labels up front. Both give the same bytes.
 */
export function writeParameterReport(
  filePath: string,
  records: readonly ParameterRecord[],
  mapping: GroupMapping,
  mode: TranslateMode,
  options: CsvFileOptions
): void {
  if (mode === 'two-pass') {
    writeCsvFile(filePath, buildCsvLines(records), options);
    const translated = translateCsvGroups(filePath, mapping, options);
    console.log(`[family-export] Translated ${translated} group labels`);
    return;
  }

  writeCsvFile(filePath, buildCsvLines(records, mapping), options);
}
