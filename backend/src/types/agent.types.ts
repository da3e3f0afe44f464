/**
 * Core types for the multi-agent dispatcher
 */

import { z } from 'zod';

export enum AgentType {
  DATABASE = 'database',
  ANALYTICS = 'analytics',
  ML = 'ml'
}

export const cellValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export type CellValue = z.infer<typeof cellValueSchema>;

export const rowSchema = z.record(cellValueSchema);

/** One result row, column name to value */
export type Row = z.infer<typeof rowSchema>;

export const intentClassificationSchema = z.object({
  primaryAgent: z.nativeEnum(AgentType),
  secondaryAgents: z.array(z.nativeEnum(AgentType)),
  reasoning: z.string(),
  subTasks: z.record(z.string()),
  source: z.enum(['llm', 'keyword'])
});

export type IntentClassification = z.infer<typeof intentClassificationSchema>;

export const databaseSettingsSchema = z.object({
  projectId: z.string(),
  datasetId: z.string(),
  location: z.string(),
  tables: z.array(z.string())
});

export type DatabaseSettings = z.infer<typeof databaseSettingsSchema>;

export const chartReferenceSchema = z.object({
  chartId: z.string(),
  filename: z.string(),
  url: z.string()
});

export type ChartReference = z.infer<typeof chartReferenceSchema>;

/**
 * Keys an agent context carries between turns.
 * Unreadable persisted values fall back to undefined.
 */
export const agentStateSchema = z.object({
  database_settings: databaseSettingsSchema.optional().catch(undefined),
  schema: z.string().optional().catch(undefined),
  intent_classification: intentClassificationSchema.optional().catch(undefined),
  query_result: z.array(rowSchema).optional().catch(undefined),
  last_query: z.string().optional().catch(undefined),
  last_response: z.string().optional().catch(undefined),
  last_sql: z.string().optional().catch(undefined),
  db_agent_output: z.string().optional().catch(undefined),
  ds_agent_output: z.string().optional().catch(undefined),
  bqml_agent_output: z.string().optional().catch(undefined),
  analytics_chart: chartReferenceSchema.optional().catch(undefined),
  current_dataset: z.string().optional().catch(undefined)
});

export type AgentState = z.infer<typeof agentStateSchema>;

export type AgentStateKey = keyof AgentState;
