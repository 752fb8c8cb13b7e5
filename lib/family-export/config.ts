/**
 * Export settings, read from environment variables
 *
 * FAMILY_EXPORT_MAPPING_PATH    group id -> label JSON (defaults to the bundled file)
 * FAMILY_EXPORT_EXCLUDED_PATH   JSON array of parameter names to leave out
 * FAMILY_EXPORT_TRANSLATE_MODE  single-pass | two-pass
 * FAMILY_EXPORT_LINE_ENDING     crlf | lf
 * FAMILY_EXPORT_BOM             true | false
 * FAMILY_EXPORT_DEBUG           true | false
 */

import { fileURLToPath } from 'url';
import { z } from 'zod';
import type { LineEnding, TranslateMode } from './types';

export const DEFAULT_MAPPING_PATH = fileURLToPath(
  new URL('../../config/group-mappings.json', import.meta.url)
);

export const DEFAULT_EXCLUDED_NAMES_PATH = fileURLToPath(
  new URL('../../config/excluded-parameters.json', import.meta.url)
);

const booleanFlag = z
  .enum(['true', 'false'])
  .transform(value => value === 'true');

const EnvSchema = z.object({
  FAMILY_EXPORT_MAPPING_PATH: z.string().min(1).default(DEFAULT_MAPPING_PATH),
  FAMILY_EXPORT_EXCLUDED_PATH: z.string().min(1).default(DEFAULT_EXCLUDED_NAMES_PATH),
  FAMILY_EXPORT_TRANSLATE_MODE: z.enum(['single-pass', 'two-pass']).default('single-pass'),
  FAMILY_EXPORT_LINE_ENDING: z.enum(['crlf', 'lf']).default('crlf'),
  FAMILY_EXPORT_BOM: booleanFlag.default('true'),
  FAMILY_EXPORT_DEBUG: booleanFlag.default('false'),
});

export interface ExportConfig {
  mappingPath: string;
  excludedNamesPath: string;
  translateMode: TranslateMode;
  lineEnding: LineEnding;
  bom: boolean;
  debug: boolean;
}

export function getExportConfig(env: NodeJS.ProcessEnv = process.env): ExportConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid configuration ${issue.path.join('.')}: ${issue.message}`);
  }

  const vars = parsed.data;
  return {
    mappingPath: vars.FAMILY_EXPORT_MAPPING_PATH,
    excludedNamesPath: vars.FAMILY_EXPORT_EXCLUDED_PATH,
    translateMode: vars.FAMILY_EXPORT_TRANSLATE_MODE,
    lineEnding: vars.FAMILY_EXPORT_LINE_ENDING,
    bom: vars.FAMILY_EXPORT_BOM,
    debug: vars.FAMILY_EXPORT_DEBUG,
  };
}
