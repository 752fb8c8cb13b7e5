/**
 * Family snapshot host adapter
 * Serves a JSON dump of a family document through the ParameterSource interface
 */

import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';
import type {
  ElementId,
  FamilyParameterDefinition,
  HostElement,
  ParameterSource,
} from './types';

const SnapshotParameterSchema = z.object({
  id: z.string().optional(),
  name: z.string(),
  group: z.string(),
  storageType: z.string(),
  formula: z.string().nullable().optional(),
  isInstance: z.boolean().optional().default(false),
  parameterType: z.string().nullable().optional(),
  valueString: z.string().nullable().optional(),
  value: z.union([z.number(), z.string()]).nullable().optional(),
});

const SnapshotElementSchema = z.object({
  id: z.number().int(),
  kind: z.string(),
  name: z.string().nullable().optional(),
});

export const FamilySnapshotSchema = z.object({
  title: z.string(),
  isFamilyDocument: z.boolean(),
  parameters: z.array(SnapshotParameterSchema).default([]),
  elements: z.array(SnapshotElementSchema).optional().default([]),
});

export type FamilySnapshot = z.infer<typeof FamilySnapshotSchema>;
export type SnapshotParameter = z.infer<typeof SnapshotParameterSchema>;

export function parseFamilySnapshot(data: unknown, origin?: string): FamilySnapshot {
  const parsed = FamilySnapshotSchema.safeParse(data);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid family snapshot${origin ? ` in ${origin}` : ''}: ${details}`);
  }
  return parsed.data;
}

export function loadFamilySnapshot(filePath: string): FamilySnapshot {
  if (!existsSync(filePath)) {
    throw new Error(`Snapshot file ${filePath} not found`);
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Snapshot file ${filePath} is not valid JSON: ${reason}`);
  }

  return parseFamilySnapshot(data, filePath);
}

export class SnapshotParameterSource implements ParameterSource {
  readonly title: string;
  readonly isFamilyDocument: boolean;
  private readonly definitions: FamilyParameterDefinition[];
  private readonly values = new Map<string, SnapshotParameter>();
  private readonly elements = new Map<ElementId, HostElement>();

  constructor(snapshot: FamilySnapshot) {
    this.title = snapshot.title;
    this.isFamilyDocument = snapshot.isFamilyDocument;

    this.definitions = snapshot.parameters.map((param, index) => {
      const id = param.id ?? String(index);
      this.values.set(id, param);
      return {
        id,
        name: param.name,
        group: param.group,
        storageType: param.storageType,
        formula: param.formula ?? null,
        isInstance: param.isInstance,
        parameterType: param.parameterType ?? null,
      };
    });

    for (const element of snapshot.elements) {
      this.elements.set(element.id, {
        id: element.id,
        kind: element.kind,
        name: element.name ?? null,
      });
    }
  }

  getParameters(): FamilyParameterDefinition[] {
    return [...this.definitions];
  }

  asValueString(param: FamilyParameterDefinition): string | null {
    return this.lookup(param).valueString ?? null;
  }

  asDouble(param: FamilyParameterDefinition): number | null {
    const value = this.lookup(param).value;
    return typeof value === 'number' ? value : null;
  }

  asInteger(param: FamilyParameterDefinition): number | null {
    const value = this.lookup(param).value;
    return typeof value === 'number' && Number.isInteger(value) ? value : null;
  }

  asString(param: FamilyParameterDefinition): string | null {
    const value = this.lookup(param).value;
    return typeof value === 'string' ? value : null;
  }

  asElementId(param: FamilyParameterDefinition): ElementId | null {
    const value = this.lookup(param).value;
    return typeof value === 'number' && Number.isInteger(value) ? value : null;
  }

  getElement(id: ElementId): HostElement | null {
    return this.elements.get(id) ?? null;
  }

  private lookup(param: FamilyParameterDefinition): SnapshotParameter {
    const entry = this.values.get(param.id);
    if (!entry) {
      throw new Error(`Parameter ${param.name} (${param.id}) is not part of this document`);
    }
    return entry;
  }
}
