/**
 * Descriptive statistics over query result rows
 */

import type { CellValue, Row } from '../../types/agent.types';

export interface ColumnStatistics {
  column: string;
  count: number;
  mean: number;
  median: number;
  stdDev: number;
  min: number;
  max: number;
  outliers: number[];
}

export interface Correlation {
  columns: [string, string];
  coefficient: number;
}

export interface DatasetStatistics {
  rowCount: number;
  columns: ColumnStatistics[];
  correlations: Correlation[];
}

const NUMERIC_TEXT = /^-?\d+(\.\d+)?$/;

/**
 * Numbers, and strings that hold a plain number, as numbers
 */
export function toNumber(value: CellValue): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && NUMERIC_TEXT.test(value.trim())) {
    return Number(value);
  }
  return null;
}

/**
 * Columns whose non-null values are all numeric
 */
export function numericColumns(rows: Row[]): string[] {
  if (rows.length === 0) {
    return [];
  }

  return Object.keys(rows[0]).filter(column => {
    const present = rows.map(row => row[column]).filter(value => value !== null && value !== undefined);
    return present.length > 0 && present.every(value => toNumber(value) !== null);
  });
}

const columnValues = (rows: Row[], column: string): number[] =>
  rows.map(row => toNumber(row[column] ?? null)).filter((value): value is number => value !== null);

export function mean(values: number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Linear-interpolated quantile of sorted values
 */
export function quantile(sorted: number[], q: number): number {
  if (sorted.length === 0) {
    return 0;
  }
  const position = (sorted.length - 1) * q;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
}

/** Sample standard deviation */
export function standardDeviation(values: number[]): number {
  if (values.length < 2) {
    return 0;
  }
  const average = mean(values);
  const variance = values.reduce((sum, value) => sum + (value - average) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}

/**
 * Values outside 1.5 IQR of the quartiles
 */
export function iqrOutliers(values: number[]): number[] {
  const sorted = [...values].sort((a, b) => a - b);
  const q1 = quantile(sorted, 0.25);
  const q3 = quantile(sorted, 0.75);
  const range = q3 - q1;
  return values.filter(value => value < q1 - 1.5 * range || value > q3 + 1.5 * range);
}

export function pearson(xs: number[], ys: number[]): number | null {
  const n = Math.min(xs.length, ys.length);
  if (n < 2) {
    return null;
  }

  const meanX = mean(xs.slice(0, n));
  const meanY = mean(ys.slice(0, n));
  let covariance = 0;
  let varianceX = 0;
  let varianceY = 0;

  for (let i = 0; i < n; i++) {
    const dx = xs[i] - meanX;
    const dy = ys[i] - meanY;
    covariance += dx * dy;
    varianceX += dx * dx;
    varianceY += dy * dy;
  }

  if (varianceX === 0 || varianceY === 0) {
    return null;
  }
  return covariance / Math.sqrt(varianceX * varianceY);
}

export function describeColumn(rows: Row[], column: string): ColumnStatistics {
  const values = columnValues(rows, column);
  const sorted = [...values].sort((a, b) => a - b);

  return {
    column,
    count: values.length,
    mean: mean(values),
    median: quantile(sorted, 0.5),
    stdDev: standardDeviation(values),
    min: sorted.length > 0 ? sorted[0] : 0,
    max: sorted.length > 0 ? sorted[sorted.length - 1] : 0,
    outliers: iqrOutliers(values)
  };
}

export function describeRows(rows: Row[]): DatasetStatistics {
  const columns = numericColumns(rows);
  const correlations: Correlation[] = [];

  for (let i = 0; i < columns.length; i++) {
    for (let j = i + 1; j < columns.length; j++) {
      // rows where both sides are numeric
      const pairs = rows
        .map(row => [toNumber(row[columns[i]] ?? null), toNumber(row[columns[j]] ?? null)])
        .filter((pair): pair is [number, number] => pair[0] !== null && pair[1] !== null);
      const coefficient = pearson(
        pairs.map(pair => pair[0]),
        pairs.map(pair => pair[1])
      );
      if (coefficient !== null) {
        correlations.push({ columns: [columns[i], columns[j]], coefficient });
      }
    }
  }

  return {
    rowCount: rows.length,
    columns: columns.map(column => describeColumn(rows, column)),
    correlations
  };
}

const round = (value: number): string => value.toFixed(2);

/**
 * Plain-text report the model interprets
 */
export function formatStatistics(stats: DatasetStatistics): string {
  const lines = [`Rows analysed: ${stats.rowCount}`];

  if (stats.columns.length === 0) {
    lines.push('No numeric columns found.');
    return lines.join('\n');
  }

  for (const column of stats.columns) {
    lines.push(
      `${column.column}: count=${column.count}, mean=${round(column.mean)}, median=${round(column.median)}, ` +
        `std=${round(column.stdDev)}, min=${round(column.min)}, max=${round(column.max)}, ` +
        `outliers=${column.outliers.length > 0 ? column.outliers.map(round).join(', ') : 'none'}`
    );
  }

  for (const correlation of stats.correlations) {
    lines.push(`correlation(${correlation.columns[0]}, ${correlation.columns[1]}) = ${round(correlation.coefficient)}`);
  }

  return lines.join('\n');
}
