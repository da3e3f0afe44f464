/**
 * BigQuery warehouse access: schema discovery, dry runs and query execution
 */

import type { BigQuery } from '@google-cloud/bigquery';
import { z } from 'zod';
import { getBigQueryClient, getBigQueryConfig } from '../config/bigquery';
import type { BigQueryConfig } from '../config/bigquery';
import { createComponentLogger } from '../config/logger';
import { getTableDoc } from '../agents/database/tableDocs';
import type { CellValue, DatabaseSettings, Row } from '../types/agent.types';

const logger = createComponentLogger('bigquery-service');

export interface ColumnInfo {
  name: string;
  type: string;
  mode: string;
  description: string;
}

export interface TableInfo {
  tableId: string;
  datasetId: string;
  projectId: string;
  fullTableId: string;
  description: string;
  numRows: number;
  numBytes: number;
  sizeGb: number;
  created: string | null;
  modified: string | null;
  schema: ColumnInfo[];
}

export interface DryRunResult {
  bytesProcessed: number;
}

export interface QueryExecution {
  rows: Row[];
  columns: string[];
  rowCount: number;
  bytesProcessed: number;
  jobId: string | null;
}

export interface Warehouse {
  listDatasets(): Promise<string[]>;
  listTables(datasetId?: string): Promise<string[]>;
  getSchemaDdl(): Promise<string>;
  dryRun(sql: string): Promise<DryRunResult>;
  execute(sql: string): Promise<QueryExecution>;
  getTableInfo(tableName: string): Promise<TableInfo | null>;
  getDatabaseSettings(): Promise<DatabaseSettings>;
}

const fieldSchema = z.object({
  name: z.string(),
  type: z.string().default('STRING'),
  mode: z.string().default('NULLABLE'),
  description: z.string().default('')
});

const numeric = z.union([z.string(), z.number()]).transform(Number);

const tableMetadataSchema = z.object({
  description: z.string().default(''),
  numRows: numeric.default(0),
  numBytes: numeric.default(0),
  creationTime: numeric.optional(),
  lastModifiedTime: numeric.optional(),
  schema: z.object({ fields: z.array(fieldSchema).default([]) }).default({ fields: [] })
});

const jobMetadataSchema = z.object({
  jobReference: z.object({ jobId: z.string() }).partial().optional(),
  statistics: z
    .object({ totalBytesProcessed: numeric.optional() })
    .partial()
    .optional()
});

const toIso = (millis: number | undefined): string | null =>
  millis === undefined || Number.isNaN(millis) ? null : new Date(millis).toISOString();

/**
 * Flatten a BigQuery value into something JSON and SQLite can hold
 */
export function normalizeCell(value: unknown): CellValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Buffer.isBuffer(value)) {
    return value.toString('base64');
  }
  if (typeof value === 'object') {
    // BigQueryDate, BigQueryTimestamp and friends wrap their text in `value`
    const wrapped: unknown = Reflect.get(value, 'value');
    if (typeof wrapped === 'string') {
      return wrapped;
    }
    // NUMERIC and BIGNUMERIC arrive as Big.js instances
    if (value.constructor?.name === 'Big') {
      return Number(String(value));
    }
    return JSON.stringify(value);
  }
  return String(value);
}

export function normalizeRow(raw: unknown): Row {
  if (!raw || typeof raw !== 'object') {
    return {};
  }
  return Object.fromEntries(Object.entries(raw).map(([key, value]) => [key, normalizeCell(value)]));
}

export class BigQueryWarehouse implements Warehouse {
  private readonly config: BigQueryConfig;

  constructor(
    config: Partial<BigQueryConfig> = {},
    private readonly clientFactory: () => BigQuery = getBigQueryClient
  ) {
    this.config = { ...getBigQueryConfig(), ...config };
  }

  private get client(): BigQuery {
    return this.clientFactory();
  }

  private get projectId(): string {
    return this.config.projectId || this.client.projectId;
  }

  async listDatasets(): Promise<string[]> {
    const [datasets] = await this.client.getDatasets();
    return datasets.map(dataset => dataset.id).filter((id): id is string => typeof id === 'string');
  }

  async listTables(datasetId: string = this.config.datasetId): Promise<string[]> {
    try {
      const [tables] = await this.client.dataset(datasetId).getTables();
      return tables.map(table => table.id).filter((id): id is string => typeof id === 'string');
    } catch (error) {
      logger.error('Error fetching tables', {
        datasetId,
        error: error instanceof Error ? error.message : String(error)
      });
      throw error;
    }
  }

  async getTableInfo(tableName: string): Promise<TableInfo | null> {
    const table = this.client.dataset(this.config.datasetId).table(tableName);
    const [exists] = await table.exists();
    if (!exists) {
      return null;
    }

    const [rawMetadata] = await table.getMetadata();
    const metadata = tableMetadataSchema.parse(rawMetadata);

    return {
      tableId: tableName,
      datasetId: this.config.datasetId,
      projectId: this.projectId,
      fullTableId: `${this.projectId}.${this.config.datasetId}.${tableName}`,
      description: metadata.description,
      numRows: metadata.numRows,
      numBytes: metadata.numBytes,
      sizeGb: Math.round((metadata.numBytes / 1024 ** 3) * 100) / 100,
      created: toIso(metadata.creationTime),
      modified: toIso(metadata.lastModifiedTime),
      schema: metadata.schema.fields
    };
  }

  /**
   * CREATE TABLE statements for every table in the dataset, each preceded by its documented purpose
   */
  async getSchemaDdl(): Promise<string> {
    const tables = await this.listTables();
    const parts: string[] = [];

    for (const tableName of tables) {
      let info: TableInfo | null;
      try {
        info = await this.getTableInfo(tableName);
      } catch (error) {
        logger.error('Error getting schema for table', {
          tableName,
          error: error instanceof Error ? error.message : String(error)
        });
        continue;
      }
      if (!info) {
        continue;
      }

      const doc = getTableDoc(tableName);
      if (doc) {
        parts.push(`-- ${doc.description}`);
      }

      const columns = info.schema.map(field => {
        let definition = `  ${field.name} ${field.type}`;
        if (field.mode === 'REQUIRED') {
          definition += ' NOT NULL';
        }
        if (field.description) {
          definition += ` -- ${field.description}`;
        }
        return definition;
      });

      parts.push(`CREATE TABLE \`${info.fullTableId}\` (`);
      parts.push(columns.join(',\n'));
      parts.push(');');
      parts.push('');
    }

    return parts.join('\n');
  }

  async dryRun(sql: string): Promise<DryRunResult> {
    const [job] = await this.client.createQueryJob({
      query: sql,
      dryRun: true,
      useQueryCache: false,
      location: this.config.location
    });
    const metadata = jobMetadataSchema.parse(job.metadata ?? {});
    return { bytesProcessed: metadata.statistics?.totalBytesProcessed ?? 0 };
  }

  async execute(sql: string): Promise<QueryExecution> {
    const startTime = Date.now();
    const [job] = await this.client.createQueryJob({
      query: sql,
      useQueryCache: false,
      location: this.config.location
    });
    const [rawRows] = await job.getQueryResults();
    const rows = rawRows.map(normalizeRow);
    const metadata = jobMetadataSchema.parse(job.metadata ?? {});

    logger.info('Query executed', {
      rowCount: rows.length,
      jobId: job.id,
      durationMs: Date.now() - startTime
    });

    return {
      rows,
      columns: rows.length > 0 ? Object.keys(rows[0]) : [],
      rowCount: rows.length,
      bytesProcessed: metadata.statistics?.totalBytesProcessed ?? 0,
      jobId: job.id ?? metadata.jobReference?.jobId ?? null
    };
  }

  async getDatabaseSettings(): Promise<DatabaseSettings> {
    return {
      projectId: this.projectId,
      datasetId: this.config.datasetId,
      location: this.config.location,
      tables: await this.listTables()
    };
  }
}
