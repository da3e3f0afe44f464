/**
 * Analytics Agent: charts, descriptive statistics and general analysis
 * over the rows the Database Agent last returned
 */

import { env } from '../../config/env';
import { createComponentLogger } from '../../config/logger';
import type { LanguageModel } from '../../services/llm.service';
import type { AgentContext, SubAgent } from '../context';
import type { ChartReference, Row } from '../../types/agent.types';
import type { ChartSpec } from './chartSpec';
import { heuristicChartSpec, parseChartSpec, summarizeRows } from './chartSpec';
import { describeRows, formatStatistics } from './statistics';
import {
  ANALYTICS_INSTRUCTION,
  CHART_SPEC_PROMPT,
  GENERAL_ANALYTICS_PROMPT,
  STATISTICS_PROMPT
} from './promptTemplates';

const logger = createComponentLogger('analytics-agent');

const VISUALIZATION_KEYWORDS = ['chart', 'graph', 'plot', 'visuali', 'bar', 'line', 'pie', 'histogram'];
const STATISTICS_KEYWORDS = [
  'statistical',
  'statistics',
  'summary',
  'correlation',
  'distribution',
  'analysis',
  'outlier',
  'anomal',
  'detect'
];

const SAMPLE_ROWS = 3;

export interface ChartRenderer {
  render(spec: ChartSpec, rows: Row[]): Promise<ChartReference>;
}

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export const isVisualizationRequest = (query: string): boolean =>
  VISUALIZATION_KEYWORDS.some(keyword => query.toLowerCase().includes(keyword));

export const isStatisticsRequest = (query: string): boolean =>
  STATISTICS_KEYWORDS.some(keyword => query.toLowerCase().includes(keyword));

export class AnalyticsAgent implements SubAgent {
  constructor(
    private readonly llm: LanguageModel,
    private readonly charts: ChartRenderer,
    private readonly temperature: number = env.ANALYTICS_AGENT_TEMPERATURE
  ) {}

  async processQuery(query: string, context?: AgentContext): Promise<string> {
    const rows = context?.getState('query_result') ?? [];
    const databaseOutput = context?.getState('db_agent_output');

    // a failed database answer with nothing to analyse is passed through untouched
    if (rows.length === 0 && databaseOutput?.includes("I don't know")) {
      return databaseOutput;
    }

    try {
      if (isVisualizationRequest(query)) {
        if (rows.length === 0) {
          return "I don't know how to create that chart. No data was provided by the database.";
        }
        return await this.createChart(query, rows, context);
      }

      if (isStatisticsRequest(query) && rows.length > 0) {
        return await this.analyzeStatistics(query, rows);
      }

      const prompt = await GENERAL_ANALYTICS_PROMPT.format({
        query,
        contextInfo: this.describeContext(rows, context)
      });
      return await this.llm.generate(prompt, {
        system: ANALYTICS_INSTRUCTION,
        temperature: this.temperature
      });
    } catch (error) {
      logger.error('Analytics request failed', { query, error: errorMessage(error) });
      return `Analytics agent error: ${errorMessage(error)}`;
    }
  }

  private describeContext(rows: Row[], context?: AgentContext): string {
    const parts: string[] = [];
    const settings = context?.getState('database_settings');
    if (settings) {
      parts.push(`Available tables: ${settings.tables.join(', ')}`);
    }
    const databaseOutput = context?.getState('db_agent_output');
    if (databaseOutput) {
      parts.push(`Database Agent Results: ${databaseOutput}`);
    }
    if (rows.length > 0) {
      parts.push(`Structured Data: ${JSON.stringify(rows.slice(0, SAMPLE_ROWS))}`);
    }
    return parts.length > 0 ? `\n${parts.join('\n')}\n` : '';
  }

  private async proposeChart(query: string, rows: Row[]): Promise<ChartSpec | null> {
    try {
      const prompt = await CHART_SPEC_PROMPT.format({
        query,
        columns: Object.keys(rows[0]).join(', '),
        sample: JSON.stringify(rows.slice(0, SAMPLE_ROWS))
      });
      const reply = await this.llm.generate(prompt, { temperature: this.temperature });
      const spec = parseChartSpec(reply, rows);
      if (!spec) {
        logger.warn('Model chart spec unusable, using heuristic', { query });
      }
      return spec;
    } catch (error) {
      logger.warn('Chart spec generation failed, using heuristic', { query, error: errorMessage(error) });
      return null;
    }
  }

  private async createChart(query: string, rows: Row[], context?: AgentContext): Promise<string> {
    const spec = (await this.proposeChart(query, rows)) ?? heuristicChartSpec(query, rows);
    if (!spec) {
      return "I don't know how to create that chart. The data has no columns to plot.";
    }

    let chart: ChartReference;
    try {
      chart = await this.charts.render(spec, rows);
    } catch (error) {
      logger.error('Chart rendering failed', { query, error: errorMessage(error) });
      return `Chart generation failed: ${errorMessage(error)}`;
    }

    context?.updateState('analytics_chart', chart);

    return `${summarizeRows(rows, query)}\n\n![Chart](${chart.url})\n\n**Chart URL:** ${chart.url}`;
  }

  private async analyzeStatistics(query: string, rows: Row[]): Promise<string> {
    const statistics = formatStatistics(describeRows(rows));

    let interpretation: string;
    try {
      const prompt = await STATISTICS_PROMPT.format({ query, statistics });
      interpretation = await this.llm.generate(prompt, {
        system: ANALYTICS_INSTRUCTION,
        temperature: this.temperature
      });
    } catch (error) {
      logger.warn('Statistics interpretation failed', { query, error: errorMessage(error) });
      interpretation = '';
    }

    const report = `**Statistical Summary**\n${statistics}`;
    return interpretation ? `${report}\n\n${interpretation}` : report;
  }
}
