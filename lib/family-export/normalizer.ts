/**
 * Value Normalizer
 * Turns the current value of a family parameter into the string written to the report
 */

import {
  DECLARED_NAME_KINDS,
  ERROR_VALUE_PREFIX,
  NONE_VALUE,
  UNKNOWN_VALUE,
  YES_NO_PARAMETER_TYPE,
} from './constants';
import type {
  ElementId,
  ExportLabels,
  FamilyParameterDefinition,
  ParameterSource,
} from './types';
import { INVALID_ELEMENT_ID } from './types';

/**
 * Resolve the display string for a parameter.
 * Prefers the host's unit-aware value string and falls back to the raw storage value.
 * Never throws: failures are reported inside the returned string.
 */
export function normalizeParameterValue(
  param: FamilyParameterDefinition,
  source: ParameterSource,
  labels: ExportLabels
): string {
  try {
    const valueString = source.asValueString(param);
    if (valueString !== null) {
      return valueString;
    }

    switch (param.storageType) {
      case 'Double': {
        const value = source.asDouble(param);
        return value !== null ? formatDouble(value) : NONE_VALUE;
      }

      case 'Integer': {
        const value = source.asInteger(param);
        // Yes/No parameters export the literal, not the 0/1 state
        if (param.parameterType === YES_NO_PARAMETER_TYPE) {
          return labels.yesNo;
        }
        return value !== null ? String(Math.trunc(value)) : NONE_VALUE;
      }

      case 'String':
        return source.asString(param) ?? NONE_VALUE;

      case 'ElementId':
        return resolveElementName(source, source.asElementId(param));

      default:
        return UNKNOWN_VALUE;
    }
  } catch (error) {
    return ERROR_VALUE_PREFIX + (error instanceof Error ? error.message : String(error));
  }
}

/**
 * Name of a referenced element (material, image, or anything else the host can look up)
 */
export function resolveElementName(source: ParameterSource, id: ElementId | null): string {
  if (id === null || id === INVALID_ELEMENT_ID) {
    return NONE_VALUE;
  }

  const element = source.getElement(id);
  if (!element) {
    return NONE_VALUE;
  }

  if (DECLARED_NAME_KINDS.has(element.kind)) {
    return element.name ?? '';
  }

  return element.name ?? UNKNOWN_VALUE;
}

/**
 * Format with at most two decimals and no trailing zeros.
 * Midpoints round away from zero on the shortest decimal form, so 12.345 gives "12.35".
 */
export function formatDouble(value: number): string {
  if (!Number.isFinite(value)) {
    return String(value);
  }

  const magnitude = Math.abs(value);
  const shortest = String(magnitude);

  if (shortest.includes('e')) {
    // below 1e-6 everything rounds to zero; from 1e21 up print every integer digit
    if (magnitude < 1) {
      return '0';
    }
    const digits = magnitude.toLocaleString('en-US', {
      maximumFractionDigits: 0,
      useGrouping: false,
    });
    return value < 0 ? `-${digits}` : digits;
  }

  const rounded = Number(`${Math.round(Number(`${shortest}e2`))}e-2`);

  if (rounded === 0) {
    return '0';
  }

  return String(value < 0 ? -rounded : rounded);
}
