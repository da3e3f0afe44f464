/**
 * Database Agent: natural language to BigQuery SQL, executed and summarised
 */

import { env } from '../../config/env';
import { createComponentLogger } from '../../config/logger';
import type { LanguageModel } from '../../services/llm.service';
import type { Warehouse } from '../../services/bigquery.service';
import type { AgentContext, SubAgent } from '../context';
import { AgentType } from '../../types/agent.types';
import type { Row } from '../../types/agent.types';
import { NL2SQL_PROMPT, buildConversationContext } from './promptTemplates';
import { getBusinessRules, getRelevantDocumentation } from './tableDocs';
import { DestructiveSqlError, prepareSql } from './sqlGuard';
import { formatSqlExamples } from './sqlExamples';
import { cleanNumericRows, formatQueryResponse } from './resultFormatter';
import { EntityResolver, formatEntitySuggestions } from './entityResolver';

const logger = createComponentLogger('database-agent');

const CONTEXT_HISTORY_SIZE = 3;
const CONTEXT_QUERY_CHARS = 50;
const SAMPLE_ROWS = 2;

export interface DatabaseAgentConfig {
  temperature: number;
  maxRows: number;
}

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export class DatabaseAgent implements SubAgent {
  private readonly config: DatabaseAgentConfig;

  constructor(
    private readonly llm: LanguageModel,
    private readonly warehouse: Warehouse,
    config: Partial<DatabaseAgentConfig> = {},
    private readonly resolver: EntityResolver = new EntityResolver(warehouse)
  ) {
    this.config = {
      temperature: env.DATABASE_AGENT_TEMPERATURE,
      maxRows: env.BIGQUERY_MAX_ROWS,
      ...config
    };
  }

  /**
   * Answer a data question from the warehouse
   */
  async processQuery(query: string, context?: AgentContext): Promise<string> {
    const enhancedQuery = this.withRecentQueries(query, context);

    let rawSql: string;
    try {
      rawSql = await this.generateSql(enhancedQuery, context);
    } catch (error) {
      logger.error('SQL generation failed', { query, error: errorMessage(error) });
      return `I don't know the answer to that question. Could not generate SQL: ${errorMessage(error)}`;
    }

    if (!rawSql.trim()) {
      return "I don't know the answer to that question. Could not generate a SQL query from your question.";
    }

    let sql: string;
    try {
      sql = prepareSql(rawSql, this.config.maxRows);
    } catch (error) {
      if (error instanceof DestructiveSqlError) {
        logger.warn('Rejected destructive SQL', { query, keyword: error.keyword });
        return `I don't know the answer to that question. The database query failed: ${error.message}`;
      }
      throw error;
    }

    logger.info('Generated SQL', { query, sql });

    try {
      await this.warehouse.dryRun(sql);
    } catch (error) {
      logger.error('Query validation failed', { sql, error: errorMessage(error) });
      return `I don't know the answer to that question. The database query failed: Query validation failed: ${errorMessage(error)}`;
    }

    let rows: Row[];
    try {
      ({ rows } = await this.warehouse.execute(sql));
    } catch (error) {
      logger.error('Query execution failed', { sql, error: errorMessage(error) });
      return `I don't know the answer to that question. The database query failed: Query execution failed: ${errorMessage(error)}`;
    }

    let response = formatQueryResponse(rows, query);
    if (rows.length === 0) {
      response = await this.withSuggestions(response, query, context);
    }

    if (context) {
      context.updateState('query_result', cleanNumericRows(rows));
      context.updateState('last_query', query);
      context.updateState('last_response', response);
      context.updateState('last_sql', sql);
    }

    logger.info('Database agent answered', { query, rowCount: rows.length });
    return response;
  }

  /**
   * Append close matches for names in a question that found nothing
   */
  private async withSuggestions(response: string, query: string, context?: AgentContext): Promise<string> {
    try {
      const settings = context?.getState('database_settings') ?? (await this.warehouse.getDatabaseSettings());
      const suggestions = await this.resolver.suggest(query, settings);
      if (suggestions.length === 0) {
        return response;
      }
      logger.info('Suggesting entity corrections', { query, count: suggestions.length });
      return `${response}\n\n${formatEntitySuggestions(suggestions)}`;
    } catch (error) {
      logger.warn('Entity suggestions failed', { query, error: errorMessage(error) });
      return response;
    }
  }

  /**
   * Hint the model with the last few database questions so follow-ups resolve
   */
  private withRecentQueries(query: string, context?: AgentContext): string {
    if (!context) {
      return query;
    }

    const recent = context
      .getRecentHistory(CONTEXT_HISTORY_SIZE)
      .filter(entry => entry.agent === AgentType.DATABASE && entry.query)
      .map(entry => `${entry.query.slice(0, CONTEXT_QUERY_CHARS)}...`);

    if (recent.length === 0) {
      return query;
    }
    return `${query}\n[Context: Recent queries include: ${recent.join(' ')}]`;
  }

  private async generateSql(question: string, context?: AgentContext): Promise<string> {
    const settings = context?.getState('database_settings') ?? (await this.warehouse.getDatabaseSettings());
    const schema = context?.getState('schema') ?? (await this.warehouse.getSchemaDdl());
    const sampleRows = (context?.getState('query_result') ?? []).slice(0, SAMPLE_ROWS);

    const prompt = await NL2SQL_PROMPT.format({
      schema,
      businessRules: getBusinessRules(),
      documentation: getRelevantDocumentation(question),
      examples: formatSqlExamples(),
      question,
      conversationContext: buildConversationContext(
        context?.getState('last_query'),
        context?.getState('last_response'),
        sampleRows
      ),
      projectId: settings.projectId,
      datasetId: settings.datasetId,
      maxRows: String(this.config.maxRows)
    });

    return this.llm.generate(prompt, { temperature: this.config.temperature });
  }
}

export { prepareSql, stripSqlFences, ensureLimit, findDestructiveKeyword } from './sqlGuard';
export { formatQueryResponse, cleanNumericRows } from './resultFormatter';
export { EntityResolver, formatEntitySuggestions } from './entityResolver';
