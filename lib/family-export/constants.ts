import type { ExportLabels } from './types';

export const CSV_HEADER = [
  'Group',
  'Name',
  'Value',
  'DescriptionField',
  'ImageField',
  'IsInstance',
] as const;

export const NONE_VALUE = 'None';
export const UNKNOWN_VALUE = 'Unknown';
export const ERROR_VALUE_PREFIX = 'Error: ';

export const YES_NO_PARAMETER_TYPE = 'YesNo';

// Resources whose declared name is exported even when empty
export const DECLARED_NAME_KINDS: ReadonlySet<string> = new Set(['Material', 'ImageType']);

export const UNMAPPED_GROUP_RANK = Number.MAX_SAFE_INTEGER;

export const FILE_NAME_MARKER = 'FamilyParameters';
export const CSV_EXTENSION = 'csv';

export const DEFAULT_LABELS: ExportLabels = {
  descriptionPlaceholder: 'Добавить описание',
  imagePlaceholder: 'Добавить картинку',
  yesNo: 'Да/Нет',
};

export const MESSAGES = {
  saveDialogTitle: 'Сохранить файл как',
  errorTitle: 'Ошибка',
  notFamilyDocument: 'Скрипт работает только с документами семейств',
  doneTitle: 'Выполнено',
  saved: 'Файл сохранен',
  cancelTitle: 'Отмена',
  cancelled: 'Операция была отменена пользователем.',
} as const;
