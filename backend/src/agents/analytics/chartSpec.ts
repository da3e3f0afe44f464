/**
 * Chart specifications proposed by the model, with a heuristic fallback
 */

import { z } from 'zod';
import type { Row } from '../../types/agent.types';
import { numericColumns } from './statistics';

export const CHART_TYPES = ['bar', 'line', 'pie', 'scatter', 'area'] as const;

export const chartSpecSchema = z.object({
  type: z.enum(CHART_TYPES),
  x: z.string().min(1),
  y: z.string().min(1).nullable().default(null),
  title: z.string().default('')
});

export type ChartType = (typeof CHART_TYPES)[number];
export type ChartSpec = z.infer<typeof chartSpecSchema>;

/**
 * Pull the first JSON object out of a model reply, fenced or not
 */
export function extractJsonObject(text: string): unknown {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(text);
  const candidate = fenced ? fenced[1] : text;
  const start = candidate.indexOf('{');
  const end = candidate.lastIndexOf('}');
  if (start === -1 || end <= start) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(candidate.slice(start, end + 1));
    return parsed;
  } catch {
    return null;
  }
}

/**
 * Accept a model-proposed spec only when its fields exist in the data
 */
export function parseChartSpec(text: string, rows: Row[]): ChartSpec | null {
  const parsed = chartSpecSchema.safeParse(extractJsonObject(text));
  if (!parsed.success || rows.length === 0) {
    return null;
  }

  const columns = Object.keys(rows[0]);
  const spec = parsed.data;
  if (!columns.includes(spec.x) || (spec.y !== null && !columns.includes(spec.y))) {
    return null;
  }
  return spec;
}

function chartTypeFromQuery(query: string): ChartType {
  const lowered = query.toLowerCase();
  if (lowered.includes('pie')) return 'pie';
  if (lowered.includes('scatter')) return 'scatter';
  if (lowered.includes('area')) return 'area';
  if (lowered.includes('line') || lowered.includes('trend') || lowered.includes('over time')) return 'line';
  return 'bar';
}

const titleCase = (field: string): string =>
  field
    .split('_')
    .filter(Boolean)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');

/**
 * First non-numeric column against the first numeric one; counts when nothing is numeric
 */
export function heuristicChartSpec(query: string, rows: Row[]): ChartSpec | null {
  if (rows.length === 0) {
    return null;
  }

  const columns = Object.keys(rows[0]);
  const numeric = numericColumns(rows);
  const categorical = columns.filter(column => !numeric.includes(column));

  const x = categorical[0] ?? columns[0];
  const y = numeric.find(column => column !== x) ?? null;
  if (x === undefined) {
    return null;
  }

  return {
    type: chartTypeFromQuery(query),
    x,
    y,
    title: y ? `${titleCase(y)} by ${titleCase(x)}` : `Count by ${titleCase(x)}`
  };
}

/**
 * Distribution text for the most relevant categorical field
 */
export function summarizeRows(rows: Row[], query: string): string {
  if (rows.length === 0) {
    return 'Data analysis complete.';
  }

  const keys = Object.keys(rows[0]);
  const lowered = query.toLowerCase();
  const sample = rows.slice(0, 10);

  const categorical = keys.filter(key => {
    const unique = new Set(sample.map(row => row[key]));
    return unique.size > 1 && unique.size <= rows.length * 0.8;
  });

  const wantsBreakdown = ['distribution', 'breakdown', 'by'].some(word => lowered.split(/\W+/).includes(word));
  const target =
    categorical.find(field => lowered.includes(field.toLowerCase()) || wantsBreakdown) ?? categorical[0];

  if (!target) {
    const shown = keys.slice(0, 3).join(', ');
    return `Data analysis complete with ${rows.length} records across ${keys.length} fields: ${shown}${keys.length > 3 ? '...' : ''}`;
  }

  const counts = new Map<string, number>();
  for (const row of rows) {
    const value = String(row[target] ?? 'Unknown');
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }

  const parts = [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .map(([value, count]) => `${value}: ${count} (${((count / rows.length) * 100).toFixed(1)}%)`);

  return `${titleCase(target)} distribution: ${parts.join(', ')}`;
}
