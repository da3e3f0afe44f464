/**
 * Suggested questions drawn from the SQL examples, with personal details masked
 */

import { maskQuestion, sqlExamples } from '../agents/database/sqlExamples';
import type { SqlExamples } from '../agents/database/sqlExamples';

export const SUGGESTION_COUNT = 3;

export class SuggestedQuestionsService {
  constructor(
    private readonly examples: SqlExamples = sqlExamples,
    private readonly random: () => number = Math.random
  ) {}

  allQuestions(): string[] {
    return this.examples.examples.map(example => maskQuestion(example.question, this.examples));
  }

  /**
   * Distinct random questions; all of them when there are too few
   */
  pick(count = SUGGESTION_COUNT): string[] {
    const questions = this.allQuestions();
    if (questions.length <= count) {
      return questions;
    }

    // partial Fisher-Yates shuffle
    for (let i = 0; i < count; i++) {
      const j = i + Math.floor(this.random() * (questions.length - i));
      [questions[i], questions[j]] = [questions[j], questions[i]];
    }
    return questions.slice(0, count);
  }
}
