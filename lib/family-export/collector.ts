/**
 * Parameter Collector
 * Enumerates family parameters, skipping formula-driven and excluded ones
 */

import { ERROR_VALUE_PREFIX } from './constants';
import { normalizeParameterValue } from './normalizer';
import type {
  CollectionStats,
  ExportLabels,
  ExportResources,
  ParameterRecord,
  ParameterSource,
} from './types';

export interface CollectedParameters {
  records: ParameterRecord[];
  stats: CollectionStats;
}

export function collectParameters(
  source: ParameterSource,
  resources: Pick<ExportResources, 'excludedNames'>,
  labels: ExportLabels,
  debug = false
): CollectedParameters {
  const definitions = source.getParameters();
  const records: ParameterRecord[] = [];
  const stats: CollectionStats = {
    total: definitions.length,
    skippedByFormula: 0,
    skippedByName: 0,
    exported: 0,
    failedValues: 0,
  };

  for (const param of definitions) {
    // Computed parameters have no value of their own
    if (param.formula) {
      stats.skippedByFormula++;
      continue;
    }

    if (resources.excludedNames.has(param.name)) {
      stats.skippedByName++;
      continue;
    }

    const value = normalizeParameterValue(param, source, labels);
    if (value.startsWith(ERROR_VALUE_PREFIX)) {
      stats.failedValues++;
      console.warn(`[family-export] Could not read "${param.name}": ${value}`);
    } else if (debug) {
      console.log(`[family-export]   ${param.name} (${param.group}) = ${value}`);
    }

    records.push({
      name: param.name,
      value,
      descriptionField: labels.descriptionPlaceholder,
      imageField: labels.imagePlaceholder,
      group: String(param.group),
      isInstance: param.isInstance,
    });
  }

  stats.exported = records.length;
  return { records, stats };
}
