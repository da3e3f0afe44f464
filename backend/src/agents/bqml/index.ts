/**
 * BigQuery ML Agent: model recommendations and BQML statements
 */

import { env } from '../../config/env';
import { createComponentLogger } from '../../config/logger';
import type { LanguageModel } from '../../services/llm.service';
import type { AgentContext, SubAgent } from '../context';
import { BQML_GUIDANCE_PROMPT, BQML_INSTRUCTION } from './promptTemplates';

const logger = createComponentLogger('bqml-agent');

export class BqmlAgent implements SubAgent {
  constructor(
    private readonly llm: LanguageModel,
    private readonly temperature: number = env.BQML_AGENT_TEMPERATURE
  ) {}

  async processQuery(query: string, context?: AgentContext): Promise<string> {
    const settings = context?.getState('database_settings');
    const rows = context?.getState('query_result') ?? [];

    const contextLines: string[] = [];
    if (settings) {
      contextLines.push(`Available tables: ${settings.tables.join(', ')}`);
      contextLines.push(`Project: ${settings.projectId}`);
      contextLines.push(`Dataset: ${settings.datasetId}`);
    }
    if (rows.length > 0) {
      contextLines.push(`Data available: ${rows.length} rows`);
      contextLines.push(`Columns: ${Object.keys(rows[0]).join(', ')}`);
    }

    try {
      const prompt = await BQML_GUIDANCE_PROMPT.format({
        query,
        contextInfo: contextLines.length > 0 ? `\n${contextLines.join('\n')}\n` : '',
        projectId: settings?.projectId || env.GOOGLE_CLOUD_PROJECT || 'project',
        datasetId: settings?.datasetId || env.BIGQUERY_DATASET_ID
      });
      return await this.llm.generate(prompt, { system: BQML_INSTRUCTION, temperature: this.temperature });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('BQML request failed', { query, error: message });
      return `BQML agent error: ${message}`;
    }
  }
}
