import type { ReportRow } from '../domain/types.js';

export const NOT_AVAILABLE = 'N/A';

export const REPORT_COLUMNS = [
  'POD_NAME',
  'NAMESPACE',
  'REPLICASET',
  'PRIORITY_CLASS',
  'PRIORITY_VALUE',
  'PDB_NAME',
  'MIN_AVAILABLE',
  'MAX_UNAVAILABLE',
] as const;

const f = (value: string | number | undefined): string => (value === undefined ? NOT_AVAILABLE : String(value));

/** The row's values in `REPORT_COLUMNS` order. */
export const rowFields = (row: ReportRow): string[] => [
  row.podName,
  row.namespace,
  f(row.replicaSet),
  f(row.priorityClassName),
  f(row.priorityValue),
  f(row.pdbName),
  f(row.minAvailable),
  f(row.maxUnavailable),
];

const toLines = (lines: string[]): string => lines.map((line) => `${line}\n`).join('');

export const renderTsv = (rows: ReportRow[]): string =>
  toLines([REPORT_COLUMNS.join('\t'), ...rows.map((row) => rowFields(row).join('\t'))]);

export const csvField = (value: string): string => (/[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value);

export const renderCsv = (rows: ReportRow[]): string =>
  toLines([REPORT_COLUMNS.join(','), ...rows.map((row) => rowFields(row).map(csvField).join(','))]);
