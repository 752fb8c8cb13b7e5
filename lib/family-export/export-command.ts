/**
 * Export Family Parameters command
 * Checks the document, builds the report, asks where to save it and writes it
 */

import { collectParameters } from './collector';
import { CSV_EXTENSION, DEFAULT_LABELS, MESSAGES } from './constants';
import { buildExportFileName } from './file-name';
import { orderParameters } from './ordering';
import type {
  CsvFileOptions,
  ExportLabels,
  ExportResources,
  ExportResult,
  Notifier,
  ParameterSource,
  SaveFilePrompt,
  TranslateMode,
} from './types';
import { writeParameterReport } from './writer';

export interface ExportHost {
  source: ParameterSource;
  prompt: SaveFilePrompt;
  notifier: Notifier;
}

export interface ExportOptions extends CsvFileOptions {
  translateMode: TranslateMode;
  initialDirectory: string;
  labels?: ExportLabels;
  debug?: boolean;
  now?: Date;
}

export async function exportFamilyParameters(
  host: ExportHost,
  resources: ExportResources,
  options: ExportOptions
): Promise<ExportResult> {
  const { source, prompt, notifier } = host;

  if (!source.isFamilyDocument) {
    console.error(`[family-export] "${source.title}" is not a family document`);
    notifier.show(MESSAGES.errorTitle, MESSAGES.notFamilyDocument);
    return { status: 'failed', message: MESSAGES.notFamilyDocument };
  }

  const { records, stats } = collectParameters(
    source,
    resources,
    options.labels ?? DEFAULT_LABELS,
    options.debug
  );
  console.log(
    `[family-export] Collected ${stats.exported} of ${stats.total} parameters ` +
      `(${stats.skippedByFormula} with formulas, ${stats.skippedByName} excluded)`
  );

  const ordered = orderParameters(records, resources.groupMapping);

  const filePath = await prompt.chooseSavePath({
    title: MESSAGES.saveDialogTitle,
    suggestedName: buildExportFileName(source.title, options.now ?? new Date()),
    extension: CSV_EXTENSION,
    initialDirectory: options.initialDirectory,
  });

  if (!filePath) {
    console.log('[family-export] Save cancelled by user');
    notifier.show(MESSAGES.cancelTitle, MESSAGES.cancelled);
    return { status: 'cancelled', message: MESSAGES.cancelled, stats };
  }

  writeParameterReport(filePath, ordered, resources.groupMapping, options.translateMode, {
    lineEnding: options.lineEnding,
    bom: options.bom,
  });
  console.log(`[family-export] Wrote ${ordered.length} rows to ${filePath}`);

  notifier.show(MESSAGES.doneTitle, MESSAGES.saved);
  return { status: 'succeeded', message: MESSAGES.saved, filePath, stats };
}
