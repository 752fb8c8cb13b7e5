import { mkdtempSync, rmSync } from 'fs';
import os from 'os';
import path from 'path';
import { SnapshotParameterSource, parseFamilySnapshot } from '@/lib/family-export';

export interface TestParameter {
  name: string;
  group: string;
  storageType: string;
  formula?: string | null;
  isInstance?: boolean;
  parameterType?: string | null;
  valueString?: string | null;
  value?: number | string | null;
}

export interface TestElement {
  id: number;
  kind: string;
  name?: string | null;
}

export function makeSource(
  parameters: TestParameter[],
  elements: TestElement[] = [],
  document: { title?: string; isFamilyDocument?: boolean } = {}
): SnapshotParameterSource {
  return new SnapshotParameterSource(
    parseFamilySnapshot({
      title: document.title ?? 'Test.rfa',
      isFamilyDocument: document.isFamilyDocument ?? true,
      parameters,
      elements,
    })
  );
}

export function makeTempDir(): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(path.join(os.tmpdir(), 'family-export-'));
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}
