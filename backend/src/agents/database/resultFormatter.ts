/**
 * Turns query rows into the short text answers the chat shows
 */

import type { CellValue, Row } from '../../types/agent.types';

const NAME_COLUMNS = ['first_name', 'last_name'];
const PREVIEW_ROWS = 5;

const FLOAT_STRING = /^-?\d+\.\d+$/;

/**
 * Whole numbers become integer strings, other numbers keep two decimals
 */
export function cleanNumericValue(value: CellValue): CellValue {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? String(value) : value.toFixed(2);
  }
  if (typeof value === 'string' && FLOAT_STRING.test(value)) {
    const parsed = Number(value);
    return Number.isInteger(parsed) ? String(parsed) : parsed.toFixed(2);
  }
  return value;
}

export function cleanNumericRows(rows: Row[]): Row[] {
  return rows.map(row =>
    Object.fromEntries(Object.entries(row).map(([key, value]) => [key, cleanNumericValue(value)]))
  );
}

const formatNumber = (value: number, fractionDigits: number): string =>
  value.toLocaleString('en-US', {
    minimumFractionDigits: fractionDigits,
    maximumFractionDigits: fractionDigits
  });

/** Numbers with thousands separators and two decimals, everything else as text */
const formatCell = (value: CellValue): string =>
  typeof value === 'number' ? formatNumber(value, 2) : String(value);

const toMetricNumber = (value: CellValue): number | null => {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '' && !Number.isNaN(Number(value))) {
    return Number(value);
  }
  return null;
};

const isPersonMetricResult = (rows: Row[]): boolean =>
  rows.length > 1 &&
  rows.every(row => Object.keys(row).length === 3) &&
  rows.some(row => Object.keys(row).some(key => NAME_COLUMNS.includes(key)));

function formatPersonMetrics(rows: Row[], question: string): string {
  const lines: string[] = [];

  rows.forEach((row, index) => {
    const metricEntry = Object.entries(row).find(([key]) => !NAME_COLUMNS.includes(key));
    if (!metricEntry || metricEntry[1] === null) {
      return;
    }
    const name = `${row.first_name ?? ''} ${row.last_name ?? ''}`;
    const metric = toMetricNumber(metricEntry[1]);
    const shown = metric === null ? String(metricEntry[1]) : formatNumber(metric, 0);
    lines.push(`${index + 1}. ${name}: ${shown}`);
  });

  const lowered = question.toLowerCase();
  if (lowered.includes('hours')) {
    return `Top employees by hours worked:\n${lines.join('\n')}`;
  }
  if (lowered.includes('top') && lowered.includes('employee')) {
    return `Top employees:\n${lines.join('\n')}`;
  }
  return lines.join('\n');
}

const pair = (row: Row): string => {
  const [label, value] = Object.values(row);
  return `${formatCell(label)}: ${formatCell(value)}`;
};

/**
 * Format raw query rows as a chat answer
 */
export function formatQueryResponse(rows: Row[], question: string): string {
  if (rows.length === 0) {
    return 'No results found for your query.';
  }

  if (isPersonMetricResult(rows)) {
    return formatPersonMetrics(rows, question);
  }

  const firstRowWidth = Object.keys(rows[0]).length;

  if (rows.length === 1 && firstRowWidth === 1) {
    const [value] = Object.values(rows[0]);
    return `Result: ${formatCell(value)}`;
  }

  if (rows.length > 1 && rows.every(row => Object.keys(row).length === 2)) {
    return rows.map(pair).join('\n');
  }

  if (rows.length === 1 && firstRowWidth === 2) {
    return pair(rows[0]);
  }

  const lines = rows.slice(0, PREVIEW_ROWS).map((row, index) => {
    if (Object.keys(row).length === 2) {
      return `${index + 1}. ${pair(row)}`;
    }
    const cells = Object.entries(row).map(([key, value]) => `${key}: ${String(value)}`);
    return `${index + 1}. ${cells.join(' | ')}`;
  });

  if (rows.length > PREVIEW_ROWS) {
    lines.push(`... and ${rows.length - PREVIEW_ROWS} more results`);
  }

  return lines.join('\n');
}
