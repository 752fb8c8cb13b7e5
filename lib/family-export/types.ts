/**
 * Family Parameter Export Types
 * Host-side contracts and the records that flow through the export pipeline
 */

export type StorageType = 'Double' | 'Integer' | 'String' | 'ElementId';

export type ElementId = number;

export const INVALID_ELEMENT_ID: ElementId = -1;

export interface FamilyParameterDefinition {
  id: string;
  name: string;
  group: string; // e.g. "PG_GEOMETRY"
  storageType: StorageType | string; // unrecognized kinds are passed through as-is
  formula?: string | null;
  isInstance: boolean;
  parameterType?: string | null; // "YesNo" marks boolean-like integers
}

export interface HostElement {
  id: ElementId;
  kind: string; // "Material", "ImageType", or any other category
  name: string | null;
}

/**
 * Read-only access to the open family document.
 * Accessors return null when the current type holds no value.
 */
export interface ParameterSource {
  readonly title: string;
  readonly isFamilyDocument: boolean;
  getParameters(): FamilyParameterDefinition[];
  asValueString(param: FamilyParameterDefinition): string | null;
  asDouble(param: FamilyParameterDefinition): number | null;
  asInteger(param: FamilyParameterDefinition): number | null;
  asString(param: FamilyParameterDefinition): string | null;
  asElementId(param: FamilyParameterDefinition): ElementId | null;
  getElement(id: ElementId): HostElement | null;
}

export interface SavePathRequest {
  title: string;
  suggestedName: string;
  extension: string;
  initialDirectory: string;
}

export interface SaveFilePrompt {
  /** Resolves to null when the user declines to pick a destination */
  chooseSavePath(request: SavePathRequest): Promise<string | null>;
}

export interface Notifier {
  show(title: string, message: string): void;
}

export interface ParameterRecord {
  name: string;
  value: string;
  descriptionField: string;
  imageField: string;
  group: string;
  isInstance: boolean;
}

export type GroupMapping = ReadonlyMap<string, string>;

export interface ExportResources {
  groupMapping: GroupMapping;
  excludedNames: ReadonlySet<string>;
}

export interface ExportLabels {
  descriptionPlaceholder: string;
  imagePlaceholder: string;
  yesNo: string;
}

export interface CollectionStats {
  total: number;
  skippedByFormula: number;
  skippedByName: number;
  exported: number;
  failedValues: number;
}

export type TranslateMode = 'single-pass' | 'two-pass';

export type LineEnding = 'crlf' | 'lf';

export interface CsvFileOptions {
  lineEnding: LineEnding;
  bom: boolean;
}

export type ExportStatus = 'succeeded' | 'failed' | 'cancelled';

export interface ExportResult {
  status: ExportStatus;
  message: string;
  filePath?: string;
  stats?: CollectionStats;
}
