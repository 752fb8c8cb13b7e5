import path from 'path';
import { CSV_EXTENSION, FILE_NAME_MARKER } from './constants';

const pad = (value: number) => String(value).padStart(2, '0');

/**
 * Local time as yyyy-MM-dd_HH-mm-ss
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

/**
 * e.g. "Door.rfa" -> "Door_FamilyParameters_2024-03-05_14-07-09.csv"
 */
export function buildExportFileName(documentTitle: string, now: Date): string {
  const baseName = path.parse(documentTitle).name;
  return `${baseName}_${FILE_NAME_MARKER}_${formatTimestamp(now)}.${CSV_EXTENSION}`;
}
