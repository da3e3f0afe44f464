/**
 * Table documentation used to ground SQL generation
 */

import { z } from 'zod';
import rawTableDocs from '../../../data/table-docs.json';

const tableDocSchema = z.object({
  description: z.string(),
  businessContext: z.string(),
  keywords: z.array(z.string()).default([]),
  columns: z.record(z.string())
});

const tableDocsSchema = z.object({
  businessRules: z.array(z.string()),
  tables: z.record(tableDocSchema)
});

export type TableDoc = z.infer<typeof tableDocSchema>;
export type TableDocs = z.infer<typeof tableDocsSchema>;

export const tableDocs: TableDocs = tableDocsSchema.parse(rawTableDocs);

export function getBusinessRules(docs: TableDocs = tableDocs): string {
  return docs.businessRules.map(rule => `- ${rule}`).join('\n');
}

export function getTableDoc(tableName: string, docs: TableDocs = tableDocs): TableDoc | null {
  return docs.tables[tableName] ?? null;
}

function renderTableDoc(tableName: string, doc: TableDoc): string {
  const columns = Object.entries(doc.columns)
    .map(([column, description]) => `  - ${column}: ${description}`)
    .join('\n');

  return [
    `Table: ${tableName}`,
    `Description: ${doc.description}`,
    `Business Context: ${doc.businessContext}`,
    'Key Columns:',
    columns
  ].join('\n');
}

const escapeRegExp = (text: string): string => text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const mentionsWord = (text: string, word: string): boolean =>
  new RegExp(`\\b${escapeRegExp(word)}\\b`).test(text);

/**
 * Documentation for tables whose name, keywords or columns appear in the question
 */
export function getRelevantDocumentation(question: string, docs: TableDocs = tableDocs): string {
  const lowered = question.toLowerCase();

  const sections = Object.entries(docs.tables)
    .filter(([tableName, doc]) =>
      lowered.includes(tableName.replace(/_/g, ' ')) ||
      lowered.includes(tableName) ||
      doc.keywords.some(keyword => mentionsWord(lowered, keyword.toLowerCase())) ||
      Object.keys(doc.columns).some(column => mentionsWord(lowered, column))
    )
    .map(([tableName, doc]) => renderTableDoc(tableName, doc));

  return sections.length > 0
    ? sections.join('\n\n')
    : 'No table-specific documentation matched the question; rely on the schema.';
}
