/**
 * Tests for the Database Agent
 */

import { DatabaseAgent } from './index';
import { InMemoryAgentContext } from '../context';
import { FakeWarehouse, ScriptedLanguageModel, TEST_DDL, failing } from '../../../tests/helpers/fakes';

describe('DatabaseAgent', () => {
  let llm: ScriptedLanguageModel;
  let warehouse: FakeWarehouse;
  let agent: DatabaseAgent;

  beforeEach(() => {
    llm = new ScriptedLanguageModel(() => '```sql\nSELECT COUNT(*) AS total FROM employee\n```');
    warehouse = new FakeWarehouse();
    warehouse.rows = [{ total: 42 }];
    agent = new DatabaseAgent(llm, warehouse, { temperature: 0.01, maxRows: 80 });
  });

  it('should generate, validate and run the query', async () => {
    const context = new InMemoryAgentContext();

    await expect(agent.processQuery('How many employees are there?', context)).resolves.toBe('Result: 42.00');

    expect(warehouse.dryRuns).toEqual(['SELECT COUNT(*) AS total FROM employee LIMIT 80']);
    expect(warehouse.executed).toEqual(['SELECT COUNT(*) AS total FROM employee LIMIT 80']);
    expect(llm.calls[0].options).toEqual({ temperature: 0.01 });
  });

  it('should remember the result for follow-up questions', async () => {
    const context = new InMemoryAgentContext();
    await agent.processQuery('How many employees are there?', context);

    expect(context.getState('query_result')).toEqual([{ total: '42' }]);
    expect(context.getState('last_query')).toBe('How many employees are there?');
    expect(context.getState('last_response')).toBe('Result: 42.00');
    expect(context.getState('last_sql')).toBe('SELECT COUNT(*) AS total FROM employee LIMIT 80');
  });

  describe('prompt', () => {
    it('should load settings and schema from the warehouse when the context has none', async () => {
      await agent.processQuery('How many employees are there?');

      const [prompt] = llm.promptsMatching(/BigQuery SQL expert/);
      expect(prompt).toContain(TEST_DDL);
      expect(prompt).toContain('`test-project.test_dataset.table_name`');
      expect(prompt).toContain('Return at most 80 rows');
      expect(prompt).toContain('Question: How many active employees do we have?');
    });

    it('should prefer settings and schema already in the context', async () => {
      const context = new InMemoryAgentContext({
        database_settings: { projectId: 'ctx-project', datasetId: 'ctx_data', location: 'EU', tables: [] },
        schema: 'CREATE TABLE ctx_table (id INT64);'
      });

      await agent.processQuery('How many employees are there?', context);

      expect(llm.calls[0].prompt).toContain('CREATE TABLE ctx_table (id INT64);');
      expect(llm.calls[0].prompt).toContain('`ctx-project.ctx_data.table_name`');
    });

    it('should mention recent database questions', async () => {
      const context = new InMemoryAgentContext();
      context.addToHistory('database', 'How many employees are there?', 'Result: 42');
      context.addToHistory('analytics', 'Plot it', 'chart');

      await agent.processQuery('And at location 104?', context);

      expect(llm.calls[0].prompt).toContain(
        'Question: And at location 104?\n[Context: Recent queries include: How many employees are there?...]'
      );
    });

    it('should include the previous answer and a data sample', async () => {
      const context = new InMemoryAgentContext({
        last_query: 'Hours by location',
        last_response: 'North: 10.00',
        query_result: [{ name: 'North', hours: '10' }, { name: 'South', hours: '4' }, { name: 'East', hours: '1' }]
      });

      await agent.processQuery('Which is lowest?', context);

      expect(llm.calls[0].prompt).toContain(
        'Previous Question: Hours by location\nPrevious Answer: North: 10.00\n' +
          'Previous Query Data Sample: [{"name":"North","hours":"10"},{"name":"South","hours":"4"}]'
      );
    });
  });

  describe('failures', () => {
    it('should explain when SQL cannot be generated', async () => {
      llm.on(/BigQuery SQL expert/, failing('model unavailable'));

      await expect(agent.processQuery('How many employees?')).resolves.toBe(
        "I don't know the answer to that question. Could not generate SQL: model unavailable"
      );
    });

    it('should explain when the model returns no SQL', async () => {
      llm.on(/BigQuery SQL expert/, '   ');

      await expect(agent.processQuery('How many employees?')).resolves.toBe(
        "I don't know the answer to that question. Could not generate a SQL query from your question."
      );
    });

    it('should refuse statements that modify data', async () => {
      llm.on(/BigQuery SQL expert/, 'DELETE FROM employee WHERE TRUE');

      await expect(agent.processQuery('Remove everyone')).resolves.toBe(
        "I don't know the answer to that question. The database query failed: Destructive operation 'DELETE' not allowed"
      );
      expect(warehouse.dryRuns).toEqual([]);
    });

    it('should stop when the dry run rejects the query', async () => {
      warehouse.dryRunError = new Error('Unrecognized name: salary');

      await expect(agent.processQuery('Average salary?')).resolves.toBe(
        "I don't know the answer to that question. The database query failed: Query validation failed: Unrecognized name: salary"
      );
      expect(warehouse.executed).toEqual([]);
    });

    it('should explain execution failures and leave the context untouched', async () => {
      warehouse.executeError = new Error('Quota exceeded');
      const context = new InMemoryAgentContext();

      await expect(agent.processQuery('How many employees?', context)).resolves.toBe(
        "I don't know the answer to that question. The database query failed: Query execution failed: Quota exceeded"
      );
      expect(context.getState('last_sql')).toBeUndefined();
    });
  });

  describe('empty results', () => {
    beforeEach(() => {
      warehouse.rows = [];
      warehouse.on(/AS name FROM/, [{ name: 'Maren Holloway' }, { name: 'Tobias Okafor' }]);
    });

    it('should suggest close names when nothing is found', async () => {
      await expect(agent.processQuery('How many hours did Maren Holowey log?', new InMemoryAgentContext())).resolves.toBe(
        [
          'No results found for your query.',
          '',
          'Did you mean:',
          '- "Maren Holloway" instead of "Maren Holowey" (employee, 86% match)',
          '',
          'Suggestions:',
          '- Try the suggested corrections above',
          '- Check spelling of names and locations',
          "- Try using different variations (e.g., 'HS' vs 'High School')",
          '- Verify the entity exists in the database'
        ].join('\n')
      );
    });

    it('should answer plainly when the question names nothing', async () => {
      await expect(agent.processQuery('How many employees left?')).resolves.toBe('No results found for your query.');
      expect(warehouse.executed).toEqual(['SELECT COUNT(*) AS total FROM employee LIMIT 80']);
    });
  });
});
