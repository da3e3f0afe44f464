/**
 * Table Info Routes
 * Warehouse tables, their schema and the documentation the agents are grounded on
 */

import { Router, Request, Response } from 'express';
import type { AppServices } from '../services/container';
import type { TableInfo } from '../services/bigquery.service';
import { ApiError } from '../middleware/error-handler';
import { ok } from '../utils/response.utils';
import { getTableDoc, tableDocs } from '../agents/database/tableDocs';
import { sqlExamples } from '../agents/database/sqlExamples';
import { createComponentLogger } from '../config/logger';
import type { DatabaseSettings } from '../types/agent.types';

const logger = createComponentLogger('table-info-routes');

const SCHEMA_CACHE_TTL = 5 * 60 * 1000; // 5 minutes

export const serializeTableInfo = (info: TableInfo) => ({
  table_id: info.tableId,
  dataset_id: info.datasetId,
  project_id: info.projectId,
  full_table_id: info.fullTableId,
  description: info.description,
  num_rows: info.numRows,
  num_bytes: info.numBytes,
  size_gb: info.sizeGb,
  created: info.created,
  modified: info.modified,
  schema: info.schema
});

const failure = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export function createTableInfoRouter(
  { warehouse }: Pick<AppServices, 'warehouse'>,
  now: () => number = Date.now
): Router {
  const router = Router();
  let schemaCache: { ddl: string; timestamp: number } | null = null;

  /**
   * GET /api/table-info
   * Dataset overview with row counts per table
   */
  router.get('/', async (_req: Request, res: Response) => {
    let settings: DatabaseSettings;
    try {
      settings = await warehouse.getDatabaseSettings();
    } catch (error) {
      logger.error('Failed to load warehouse settings', { error: failure(error) });
      throw new ApiError(503, `Warehouse unavailable: ${failure(error)}`, 'WAREHOUSE_UNAVAILABLE');
    }

    const tables = await Promise.all(
      settings.tables.map(async tableName => {
        let info: TableInfo | null = null;
        try {
          info = await warehouse.getTableInfo(tableName);
        } catch (error) {
          logger.warn('Failed to load table info', { tableName, error: failure(error) });
        }
        return {
          name: tableName,
          num_rows: info?.numRows ?? null,
          description: info?.description || getTableDoc(tableName)?.description || ''
        };
      })
    );

    ok(res, {
      project_id: settings.projectId,
      dataset_id: settings.datasetId,
      location: settings.location,
      table_count: tables.length,
      tables
    });
  });

  /**
   * GET /api/table-info/schema
   * DDL with sample rows, cached for five minutes
   */
  router.get('/schema', async (_req: Request, res: Response) => {
    if (schemaCache && now() - schemaCache.timestamp <= SCHEMA_CACHE_TTL) {
      return ok(res, { schema: schemaCache.ddl, cached: true });
    }

    let ddl: string;
    try {
      ddl = await warehouse.getSchemaDdl();
    } catch (error) {
      logger.error('Failed to load schema', { error: failure(error) });
      throw new ApiError(503, `Warehouse unavailable: ${failure(error)}`, 'WAREHOUSE_UNAVAILABLE');
    }

    schemaCache = { ddl, timestamp: now() };
    ok(res, { schema: ddl, cached: false });
  });

  /**
   * GET /api/table-info/table/:tableName
   */
  router.get('/table/:tableName', async (req: Request<{ tableName: string }>, res: Response) => {
    const { tableName } = req.params;
    let info: TableInfo | null;
    try {
      info = await warehouse.getTableInfo(tableName);
    } catch (error) {
      logger.error('Failed to load table info', { tableName, error: failure(error) });
      throw new ApiError(503, `Warehouse unavailable: ${failure(error)}`, 'WAREHOUSE_UNAVAILABLE');
    }
    if (!info) {
      throw new ApiError(404, `Table ${tableName} not found`, 'TABLE_NOT_FOUND');
    }

    ok(res, { ...serializeTableInfo(info), documentation: getTableDoc(tableName) });
  });

  /**
   * GET /api/table-info/documentation
   */
  router.get('/documentation', (_req: Request, res: Response) => {
    ok(res, {
      business_rules: tableDocs.businessRules,
      tables: tableDocs.tables
    });
  });

  /**
   * GET /api/table-info/documentation/:tableName
   */
  router.get('/documentation/:tableName', (req: Request<{ tableName: string }>, res: Response) => {
    const doc = getTableDoc(req.params.tableName);
    if (!doc) {
      throw new ApiError(404, `No documentation for table ${req.params.tableName}`, 'TABLE_NOT_FOUND');
    }
    ok(res, { table: req.params.tableName, ...doc });
  });

  /**
   * GET /api/table-info/sql-examples
   */
  router.get('/sql-examples', (_req: Request, res: Response) => {
    ok(res, { examples: sqlExamples.examples, count: sqlExamples.examples.length });
  });

  return router;
}
