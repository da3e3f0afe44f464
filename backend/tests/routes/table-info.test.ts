/**
 * Table Info Routes Integration Tests
 */

import request from 'supertest';
import { buildTestApp } from '../helpers/app';
import type { TestApp } from '../helpers/app';
import { TEST_DDL, tableInfo } from '../helpers/fakes';
import { getTableDoc } from '../../src/agents/database/tableDocs';

describe('Table Info Routes', () => {
  let testApp: TestApp;

  beforeEach(() => {
    testApp = buildTestApp();
    testApp.warehouse.tables = { employee: tableInfo('employee', 120) };
  });

  afterEach(() => {
    jest.restoreAllMocks();
    testApp.close();
  });

  it('should list the dataset tables with their row counts', async () => {
    const response = await request(testApp.app).get('/api/table-info');

    expect(response.body.data).toEqual({
      project_id: 'test-project',
      dataset_id: 'test_dataset',
      location: 'US',
      table_count: 2,
      tables: [
        { name: 'employee', num_rows: 120, description: 'One row per worker with personal and employment details' },
        { name: 'time_entry', num_rows: null, description: expect.any(String) }
      ]
    });
  });

  it('should answer 503 when the warehouse cannot be reached', async () => {
    testApp.warehouse.settingsError = new Error('permission denied');

    const response = await request(testApp.app).get('/api/table-info');

    expect(response.status).toBe(503);
    expect(response.body.error).toMatchObject({
      message: 'Warehouse unavailable: permission denied',
      code: 'WAREHOUSE_UNAVAILABLE'
    });
  });

  it('should keep listing tables when one table cannot be described', async () => {
    jest.spyOn(testApp.warehouse, 'getTableInfo').mockImplementation(async tableName => {
      if (tableName === 'time_entry') {
        throw new Error('table read timed out');
      }
      return tableInfo(tableName, 120);
    });

    const response = await request(testApp.app).get('/api/table-info');

    expect(response.status).toBe(200);
    expect(response.body.data.tables).toEqual([
      { name: 'employee', num_rows: 120, description: 'One row per worker with personal and employment details' },
      { name: 'time_entry', num_rows: null, description: getTableDoc('time_entry')?.description }
    ]);
  });

  it('should cache the schema', async () => {
    const getSchemaDdl = jest.spyOn(testApp.warehouse, 'getSchemaDdl');

    const first = await request(testApp.app).get('/api/table-info/schema');
    const second = await request(testApp.app).get('/api/table-info/schema');

    expect(first.body.data).toEqual({ schema: TEST_DDL, cached: false });
    expect(second.body.data).toEqual({ schema: TEST_DDL, cached: true });
    expect(getSchemaDdl).toHaveBeenCalledTimes(1);
  });

  it('should describe a table with its documentation', async () => {
    const response = await request(testApp.app).get('/api/table-info/table/employee');

    expect(response.body.data).toMatchObject({
      table_id: 'employee',
      full_table_id: 'test-project.test_dataset.employee',
      num_rows: 120,
      documentation: { description: 'One row per worker with personal and employment details' }
    });
  });

  it('should answer 503 when a table cannot be read', async () => {
    jest.spyOn(testApp.warehouse, 'getTableInfo').mockRejectedValue(new Error('permission denied'));

    const response = await request(testApp.app).get('/api/table-info/table/employee');

    expect(response.status).toBe(503);
    expect(response.body.error).toMatchObject({
      message: 'Warehouse unavailable: permission denied',
      code: 'WAREHOUSE_UNAVAILABLE'
    });
  });

  it('should return 404 for an unknown table', async () => {
    const response = await request(testApp.app).get('/api/table-info/table/payroll');

    expect(response.status).toBe(404);
    expect(response.body.error.message).toBe('Table payroll not found');
  });

  it('should serve the table documentation', async () => {
    const all = await request(testApp.app).get('/api/table-info/documentation');
    const one = await request(testApp.app).get('/api/table-info/documentation/employee');
    const missing = await request(testApp.app).get('/api/table-info/documentation/payroll');

    expect(Object.keys(all.body.data.tables)).toEqual(
      expect.arrayContaining(['employee', 'location', 'activity', 'time_entry', 'absence', 'posting_date'])
    );
    expect(one.body.data).toMatchObject({
      table: 'employee',
      description: 'One row per worker with personal and employment details'
    });
    expect(missing.status).toBe(404);
  });

  it('should serve the SQL examples', async () => {
    const response = await request(testApp.app).get('/api/table-info/sql-examples');

    expect(response.body.data.count).toBe(12);
    expect(response.body.data.examples[0].question).toBe('How many active employees do we have?');
  });
});
