/**
 * Family Parameter Export - Main Export
 */

export { collectParameters } from './collector';
export { normalizeParameterValue, resolveElementName, formatDouble } from './normalizer';
export { orderParameters, buildGroupRanks } from './ordering';
export { escapeCsvField, formatCsvRow, parseCsv } from './csv';
export {
  buildCsvLines,
  writeCsvFile,
  translateCsvGroups,
  writeParameterReport,
} from './writer';
export { loadGroupMapping, loadExcludedNames, loadExportResources } from './resources';
export { getExportConfig } from './config';
export { buildExportFileName, formatTimestamp } from './file-name';
export { exportFamilyParameters } from './export-command';
export {
  SnapshotParameterSource,
  loadFamilySnapshot,
  parseFamilySnapshot,
} from './snapshot-source';
export { DEFAULT_LABELS, MESSAGES } from './constants';
export type { CollectedParameters } from './collector';
export type { CsvRecord } from './csv';
export type { ExportConfig } from './config';
export type { ExportHost, ExportOptions } from './export-command';
export type { FamilySnapshot } from './snapshot-source';
export type {
  CollectionStats,
  ElementId,
  ExportLabels,
  ExportResources,
  ExportResult,
  ExportStatus,
  FamilyParameterDefinition,
  GroupMapping,
  HostElement,
  Notifier,
  ParameterRecord,
  ParameterSource,
  SaveFilePrompt,
  SavePathRequest,
  StorageType,
} from './types';
