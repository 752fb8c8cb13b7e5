/**
 * Loads the group mapping and the excluded parameter names shipped with the tool
 */

import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';
import type { ExportResources, GroupMapping } from './types';

export const GroupMappingSchema = z.record(z.string());

export const ExcludedNamesSchema = z.array(z.string());

function readJsonResource(filePath: string): unknown {
  if (!existsSync(filePath)) {
    throw new Error(`Resource ${filePath} not found`);
  }

  try {
    return JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Resource ${filePath} is not valid JSON: ${reason}`);
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Key order in the file is the group sort order.
 * Note: JSON objects list integer-like keys ("5", "12") first, in ascending order.
 */
export function loadGroupMapping(filePath: string): GroupMapping {
  const parsed = GroupMappingSchema.safeParse(readJsonResource(filePath));
  if (!parsed.success) {
    throw new Error(`Invalid group mapping in ${filePath}: ${describeIssues(parsed.error)}`);
  }
  return new Map(Object.entries(parsed.data));
}

export function loadExcludedNames(filePath: string): ReadonlySet<string> {
  const parsed = ExcludedNamesSchema.safeParse(readJsonResource(filePath));
  if (!parsed.success) {
    throw new Error(`Invalid excluded names in ${filePath}: ${describeIssues(parsed.error)}`);
  }
  return new Set(parsed.data);
}

export function loadExportResources(paths: {
  mappingPath: string;
  excludedNamesPath: string;
}): ExportResources {
  const groupMapping = loadGroupMapping(paths.mappingPath);
  const excludedNames = loadExcludedNames(paths.excludedNamesPath);

  console.log(
    `[family-export] Loaded ${groupMapping.size} group labels and ${excludedNames.size} excluded names`
  );

  return { groupMapping, excludedNames };
}
