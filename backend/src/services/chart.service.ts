/**
 * Chart rendering: Vega-Lite specs compiled to Vega and rendered headless to SVG
 */

import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { parse, View } from 'vega';
import { compile } from 'vega-lite';
import type { TopLevelSpec } from 'vega-lite';
import { env } from '../config/env';
import { createComponentLogger } from '../config/logger';
import type { ChartSpec } from '../agents/analytics/chartSpec';
import type { ChartReference, Row } from '../types/agent.types';

const logger = createComponentLogger('chart-service');

const CHART_FILENAME = /^chart_[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\.svg$/;
const VEGA_LITE_SCHEMA = 'https://vega.github.io/schema/vega-lite/v5.json';

export function isChartFilename(filename: string): boolean {
  return CHART_FILENAME.test(filename);
}

/**
 * Vega-Lite spec for a chart over inline rows
 */
export function toVegaLite(chart: ChartSpec, rows: Row[]): TopLevelSpec {
  const data = { values: rows };
  const title = chart.title || undefined;

  if (chart.type === 'pie') {
    return {
      $schema: VEGA_LITE_SCHEMA,
      title,
      data,
      mark: { type: 'arc' },
      encoding: {
        theta: chart.y
          ? { field: chart.y, type: 'quantitative' }
          : { aggregate: 'count', type: 'quantitative' },
        color: { field: chart.x, type: 'nominal' }
      }
    };
  }

  return {
    $schema: VEGA_LITE_SCHEMA,
    title,
    data,
    mark: { type: chart.type === 'scatter' ? 'point' : chart.type, tooltip: true },
    encoding: {
      x: { field: chart.x, type: chart.type === 'scatter' ? 'quantitative' : chart.type === 'bar' ? 'nominal' : 'ordinal' },
      y: chart.y
        ? { field: chart.y, type: 'quantitative' }
        : { aggregate: 'count', type: 'quantitative' }
    }
  };
}

export class ChartService {
  constructor(private readonly chartDir: string = env.CHART_DIR) {}

  /**
   * Render a chart to `chart_<uuid>.svg` and return where it is served
   */
  async render(chart: ChartSpec, rows: Row[]): Promise<ChartReference> {
    const chartId = uuidv4();
    const filename = `chart_${chartId}.svg`;

    const view = new View(parse(compile(toVegaLite(chart, rows)).spec), { renderer: 'none' });
    try {
      const svg = await view.toSVG();
      await fs.promises.mkdir(this.chartDir, { recursive: true });
      await fs.promises.writeFile(path.join(this.chartDir, filename), svg, 'utf8');
    } finally {
      view.finalize();
    }

    logger.info('Chart rendered', { chartId, type: chart.type, rowCount: rows.length });
    return { chartId, filename, url: `/api/charts/${filename}` };
  }

  /**
   * Absolute path of an existing chart, or null for unknown or unsafe names
   */
  getChartPath(filename: string): string | null {
    if (!isChartFilename(filename)) {
      return null;
    }

    const root = path.resolve(this.chartDir);
    const chartPath = path.resolve(root, filename);
    if (path.dirname(chartPath) !== root || !fs.existsSync(chartPath)) {
      return null;
    }
    return chartPath;
  }
}
