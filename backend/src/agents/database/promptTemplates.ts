/**
 * Prompt templates for natural-language to BigQuery SQL
 */

import { PromptTemplate } from '@langchain/core/prompts';

export const NL2SQL_PROMPT = new PromptTemplate({
  template: `You are a BigQuery SQL expert. Convert the natural language question below into one valid BigQuery Standard SQL query.

Database Schema:
{schema}

Business Rules:
{businessRules}

Relevant Table Documentation:
{documentation}

Example Queries:
{examples}

Question: {question}
{conversationContext}
Guidelines:
1. Use fully qualified table names: \`{projectId}.{datasetId}.table_name\`
2. Return at most {maxRows} rows using a LIMIT clause
3. Use BigQuery functions such as DATETIME_DIFF, DATE_SUB and EXTRACT
4. Use proper GROUP BY clauses for aggregations
5. Use LOWER() for case-insensitive comparisons
6. Only read data: never modify tables or schemas
7. Return only the SQL query, no explanations

SQL Query:`,
  inputVariables: [
    'schema',
    'businessRules',
    'documentation',
    'examples',
    'question',
    'conversationContext',
    'projectId',
    'datasetId',
    'maxRows'
  ]
});

/**
 * Previous question, answer and a data sample so follow-ups can refer back
 */
export function buildConversationContext(
  lastQuery: string | undefined,
  lastResponse: string | undefined,
  sampleRows: unknown[]
): string {
  if (!lastQuery || !lastResponse) {
    return '';
  }

  let context = `\nCONVERSATION CONTEXT:\nPrevious Question: ${lastQuery}\nPrevious Answer: ${lastResponse}\n`;
  if (sampleRows.length > 0) {
    context += `Previous Query Data Sample: ${JSON.stringify(sampleRows)}\n`;
  }
  return context;
}
