/**
 * In-process stand-ins for Gemini and BigQuery
 */

import type { GenerateOptions, LanguageModel } from '../../src/services/llm.service';
import type {
  DryRunResult,
  QueryExecution,
  TableInfo,
  Warehouse
} from '../../src/services/bigquery.service';
import type { DatabaseSettings, Row } from '../../src/types/agent.types';

export interface ModelCall {
  prompt: string;
  options: GenerateOptions;
}

export type Responder = (prompt: string, options: GenerateOptions) => string;

/**
 * Answers each prompt with the first rule whose pattern matches; a responder may throw
 */
export class ScriptedLanguageModel implements LanguageModel {
  readonly calls: ModelCall[] = [];
  private readonly rules: Array<{ pattern: RegExp; respond: Responder }> = [];

  constructor(private readonly fallback: Responder = () => 'OK') {}

  on(pattern: RegExp, respond: string | Responder): this {
    this.rules.push({ pattern, respond: typeof respond === 'string' ? () => respond : respond });
    return this;
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    this.calls.push({ prompt, options });
    const rule = this.rules.find(candidate => candidate.pattern.test(prompt));
    return (rule ? rule.respond : this.fallback)(prompt, options);
  }

  promptsMatching(pattern: RegExp): string[] {
    return this.calls.map(call => call.prompt).filter(prompt => pattern.test(prompt));
  }
}

export const failing = (message: string): Responder => () => {
  throw new Error(message);
};

export const TEST_SETTINGS: DatabaseSettings = {
  projectId: 'test-project',
  datasetId: 'test_dataset',
  location: 'US',
  tables: ['employee', 'time_entry']
};

export const TEST_DDL = 'CREATE TABLE `test-project.test_dataset.employee` (\n  id INT64,\n  first_name STRING\n);';

export class FakeWarehouse implements Warehouse {
  readonly dryRuns: string[] = [];
  readonly executed: string[] = [];
  rows: Row[] = [];
  dryRunError: Error | null = null;
  executeError: Error | null = null;
  settingsError: Error | null = null;
  tables: Record<string, TableInfo> = {};
  private readonly results: Array<{ pattern: RegExp; rows: Row[] }> = [];

  /** Rows for queries matching a pattern; anything else gets `rows` */
  on(pattern: RegExp, rows: Row[]): this {
    this.results.push({ pattern, rows });
    return this;
  }

  async listDatasets(): Promise<string[]> {
    return [TEST_SETTINGS.datasetId];
  }

  async listTables(): Promise<string[]> {
    return [...TEST_SETTINGS.tables];
  }

  async getSchemaDdl(): Promise<string> {
    if (this.settingsError) {
      throw this.settingsError;
    }
    return TEST_DDL;
  }

  async dryRun(sql: string): Promise<DryRunResult> {
    this.dryRuns.push(sql);
    if (this.dryRunError) {
      throw this.dryRunError;
    }
    return { bytesProcessed: 1024 };
  }

  async execute(sql: string): Promise<QueryExecution> {
    this.executed.push(sql);
    if (this.executeError) {
      throw this.executeError;
    }
    const rows = this.results.find(result => result.pattern.test(sql))?.rows ?? this.rows;
    return {
      rows,
      columns: rows.length > 0 ? Object.keys(rows[0]) : [],
      rowCount: rows.length,
      bytesProcessed: 1024,
      jobId: 'job-1'
    };
  }

  async getTableInfo(tableName: string): Promise<TableInfo | null> {
    return this.tables[tableName] ?? null;
  }

  async getDatabaseSettings(): Promise<DatabaseSettings> {
    if (this.settingsError) {
      throw this.settingsError;
    }
    return { ...TEST_SETTINGS, tables: [...TEST_SETTINGS.tables] };
  }
}

export const tableInfo = (tableName: string, numRows: number): TableInfo => ({
  tableId: tableName,
  datasetId: TEST_SETTINGS.datasetId,
  projectId: TEST_SETTINGS.projectId,
  fullTableId: `${TEST_SETTINGS.projectId}.${TEST_SETTINGS.datasetId}.${tableName}`,
  description: '',
  numRows,
  numBytes: 2048,
  sizeGb: 0,
  created: null,
  modified: null,
  schema: [{ name: 'id', type: 'INT64', mode: 'REQUIRED', description: '' }]
});
