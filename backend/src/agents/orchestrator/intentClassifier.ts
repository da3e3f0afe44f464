/**
 * Intent Classifier for deciding which agents answer a question
 */

import { env } from '../../config/env';
import { createComponentLogger } from '../../config/logger';
import type { LanguageModel } from '../../services/llm.service';
import type { AgentContext } from '../context';
import { extractJsonObject } from '../analytics/chartSpec';
import { AgentType, rawClassificationSchema } from './types';
import type { ClassificationCriteria, IntentClassification } from './types';
import { CLASSIFICATION_PROMPT, formatRecentHistory, formatResultContext } from './promptTemplates';

const logger = createComponentLogger('intent-classifier');

const HISTORY_SIZE = 5;
const RESULT_PREVIEW_CHARS = 200;

/**
 * Map the many names the model uses for an agent onto one
 */
export function normalizeAgentName(name: string): AgentType | null {
  const lowered = name.toLowerCase();
  if (lowered.includes('database') || lowered.includes('bigquery') || lowered.includes('db_agent')) {
    return AgentType.DATABASE;
  }
  if (lowered.includes('analytics') || lowered.includes('ds_agent')) {
    return AgentType.ANALYTICS;
  }
  if (lowered.includes('bqml') || lowered.includes('ml')) {
    return AgentType.ML;
  }
  return null;
}

/**
 * Parse the model's routing reply; null when it is not usable
 */
export function parseClassification(text: string): IntentClassification | null {
  const parsed = rawClassificationSchema.safeParse(extractJsonObject(text));
  if (!parsed.success) {
    return null;
  }

  const primaryAgent = normalizeAgentName(parsed.data.primary_agent);
  if (!primaryAgent) {
    return null;
  }

  const secondaryAgents: AgentType[] = [];
  for (const name of parsed.data.secondary_agents) {
    const agent = normalizeAgentName(name);
    if (agent && agent !== primaryAgent && !secondaryAgents.includes(agent)) {
      secondaryAgents.push(agent);
    }
  }

  const rawTasks = parsed.data.sub_tasks;
  const subTasks = Array.isArray(rawTasks)
    ? Object.fromEntries(rawTasks.map((task, index) => [String(index), task]))
    : rawTasks;

  return {
    primaryAgent,
    secondaryAgents,
    reasoning: parsed.data.reasoning,
    subTasks,
    source: 'llm'
  };
}

export class IntentClassifier {
  private readonly criteria: ClassificationCriteria = {
    visualizationKeywords: ['chart', 'graph', 'plot', 'visuali', 'histogram', 'pie'],
    mlPatterns: [/\bpredict/, /\bforecast/, /\bmodel/, /\btrain/, /\bclassif/, /\bcluster/, /\bchurn/],
    analyticsKeywords: [
      'statistic',
      'correlation',
      'regression',
      'distribution',
      'outlier',
      'anomal',
      'methodology'
    ],
    analyticsPatterns: [/\bhow do i\b/, /\bpython\b/]
  };

  constructor(
    private readonly llm: LanguageModel,
    private readonly temperature: number = env.ROOT_AGENT_TEMPERATURE
  ) {}

  /**
   * Ask the model for a routing decision, falling back to keywords
   */
  async classifyIntent(message: string, context: AgentContext): Promise<IntentClassification> {
    let classification: IntentClassification | null = null;

    try {
      const prompt = await CLASSIFICATION_PROMPT.format({
        message,
        historyText: formatRecentHistory(context.getRecentHistory(HISTORY_SIZE)),
        resultContext: formatResultContext(context.getState('query_result'), RESULT_PREVIEW_CHARS),
        schema: context.getState('schema') ?? 'No schema available'
      });
      const reply = await this.llm.generate(prompt, { temperature: this.temperature });
      classification = parseClassification(reply);
      if (!classification) {
        logger.warn('Unparseable classification reply', { reply: reply.slice(0, 200) });
      }
    } catch (error) {
      logger.warn('Intent classification failed', {
        error: error instanceof Error ? error.message : String(error)
      });
    }

    const result = classification ?? this.classifyByKeywords(message);
    context.updateState('intent_classification', result);

    logger.info('Intent classified', {
      primaryAgent: result.primaryAgent,
      secondaryAgents: result.secondaryAgents,
      source: result.source
    });
    return result;
  }

  /**
   * Keyword routing used when the model cannot classify
   */
  classifyByKeywords(message: string): IntentClassification {
    const text = message.toLowerCase();
    const subTasks = { '0': message };

    if (this.criteria.visualizationKeywords.some(keyword => text.includes(keyword))) {
      return {
        primaryAgent: AgentType.DATABASE,
        secondaryAgents: [AgentType.ANALYTICS],
        reasoning: 'Keyword fallback: visualization request needs data and a chart',
        subTasks,
        source: 'keyword'
      };
    }

    if (this.criteria.mlPatterns.some(pattern => pattern.test(text))) {
      return {
        primaryAgent: AgentType.ML,
        secondaryAgents: [],
        reasoning: 'Keyword fallback: machine learning vocabulary',
        subTasks,
        source: 'keyword'
      };
    }

    if (
      this.criteria.analyticsKeywords.some(keyword => text.includes(keyword)) ||
      this.criteria.analyticsPatterns.some(pattern => pattern.test(text))
    ) {
      return {
        primaryAgent: AgentType.ANALYTICS,
        secondaryAgents: [],
        reasoning: 'Keyword fallback: statistical or methodology question',
        subTasks,
        source: 'keyword'
      };
    }

    return {
      primaryAgent: AgentType.DATABASE,
      secondaryAgents: [],
      reasoning: 'Keyword fallback: data question',
      subTasks,
      source: 'keyword'
    };
  }
}
