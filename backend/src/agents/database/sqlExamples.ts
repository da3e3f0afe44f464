/**
 * Question and SQL pairs used as few-shot examples and as suggested questions
 */

import { z } from 'zod';
import rawSqlExamples from '../../../data/sql-examples.json';

const sqlExamplesSchema = z.object({
  masks: z.array(
    z.object({
      pattern: z.string(),
      replacement: z.string(),
      flags: z.string().default('g')
    })
  ),
  examples: z.array(z.object({ question: z.string(), sql: z.string() }))
});

export type SqlExamples = z.infer<typeof sqlExamplesSchema>;
export type SqlExample = SqlExamples['examples'][number];

export const sqlExamples: SqlExamples = sqlExamplesSchema.parse(rawSqlExamples);

/**
 * Replace personal names and location codes with placeholders
 */
export function maskQuestion(question: string, examples: SqlExamples = sqlExamples): string {
  return examples.masks.reduce(
    (masked, mask) => masked.replace(new RegExp(mask.pattern, mask.flags), mask.replacement),
    question
  );
}

export function formatSqlExamples(examples: SqlExamples = sqlExamples): string {
  return examples.examples.map(example => `Question: ${example.question}\nSQL: ${example.sql}`).join('\n\n');
}
