/**
 * Root Agent: classify the question, call the chosen agents, combine their answers
 */

import { env } from '../../config/env';
import { createComponentLogger } from '../../config/logger';
import type { LanguageModel } from '../../services/llm.service';
import type { Warehouse } from '../../services/bigquery.service';
import type { AgentContext } from '../context';
import { IntentClassifier } from './intentClassifier';
import {
  SYNTHESIS_PROMPT,
  errorResponse,
  globalInstruction
} from './promptTemplates';
import { AGENT_OUTPUTS, AgentType, PRIMARY_PREFIXES, SECONDARY_PREFIXES } from './types';
import type { IntentClassification, SubAgents } from './types';

const logger = createComponentLogger('root-agent');

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export interface RootAgentOptions {
  temperature?: number;
  classifier?: IntentClassifier;
  now?: () => Date;
}

export class RootAgent {
  private readonly classifier: IntentClassifier;
  private readonly temperature: number;
  private readonly now: () => Date;

  constructor(
    private readonly llm: LanguageModel,
    private readonly agents: SubAgents,
    private readonly warehouse: Warehouse,
    options: RootAgentOptions = {}
  ) {
    this.temperature = options.temperature ?? env.ROOT_AGENT_TEMPERATURE;
    this.classifier = options.classifier ?? new IntentClassifier(llm, this.temperature);
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Answer one chat message. Never throws: failures become user-facing text.
   */
  async processMessage(message: string, context: AgentContext): Promise<string> {
    const startTime = Date.now();
    try {
      await this.setup(context);
      const intent = await this.classifier.classifyIntent(message, context);
      const response = await this.route(message, intent, context);

      logger.info('Message processed', {
        primaryAgent: intent.primaryAgent,
        responseLength: response.length,
        durationMs: Date.now() - startTime
      });
      return response;
    } catch (error) {
      logger.error('Root agent failed', { error: errorMessage(error) });
      return errorResponse(errorMessage(error));
    }
  }

  /**
   * Load warehouse settings and schema into the context once
   */
  private async setup(context: AgentContext): Promise<void> {
    if (context.getState('database_settings') && context.getState('schema') !== undefined) {
      return;
    }

    try {
      context.updateState('database_settings', await this.warehouse.getDatabaseSettings());
      context.updateState('schema', await this.warehouse.getSchemaDdl());
    } catch (error) {
      // answers that need no warehouse still work
      logger.warn('Warehouse setup failed', { error: errorMessage(error) });
    }
  }

  /**
   * Run one agent, recording its output in state and history
   */
  private async callAgent(type: AgentType, message: string, context: AgentContext): Promise<string> {
    const output = await this.agents[type].processQuery(message, context);
    const { stateKey, historyName } = AGENT_OUTPUTS[type];
    context.updateState(stateKey, output);
    context.addToHistory(historyName, message, output);
    return output;
  }

  private async route(message: string, intent: IntentClassification, context: AgentContext): Promise<string> {
    const { primaryAgent, secondaryAgents } = intent;
    const responses: string[] = [];

    try {
      const response = await this.callAgent(primaryAgent, message, context);
      const standalone = primaryAgent === AgentType.DATABASE && secondaryAgents.length === 0;
      responses.push(standalone ? response : `${PRIMARY_PREFIXES[primaryAgent]}${response}`);
    } catch (error) {
      logger.error('Primary agent failed, answering directly', {
        agent: primaryAgent,
        error: errorMessage(error)
      });
      responses.push(
        await this.llm.generate(`User Query: ${message}`, {
          system: globalInstruction(this.now()),
          temperature: this.temperature
        })
      );
    }

    for (const agent of secondaryAgents) {
      if (agent === primaryAgent) {
        continue;
      }
      let response: string;
      try {
        response = await this.callAgent(agent, message, context);
      } catch (error) {
        logger.error('Secondary agent failed', { agent, error: errorMessage(error) });
        response = `Error: ${errorMessage(error)}`;
      }
      responses.push(`${SECONDARY_PREFIXES[agent]}${response}`);
    }

    if (responses.length > 1) {
      return this.combine(message, responses);
    }
    return responses[0] ?? 'No response generated.';
  }

  /**
   * Chart and code answers are returned as they are; anything else is synthesised
   */
  private async combine(message: string, responses: string[]): Promise<string> {
    const chartOrCode = responses.find(response => response.includes('```') || response.includes('/api/charts/'));
    if (chartOrCode) {
      return chartOrCode;
    }

    try {
      const prompt = await SYNTHESIS_PROMPT.format({ message, responses: responses.join('\n') });
      return await this.llm.generate(prompt, { temperature: this.temperature });
    } catch (error) {
      logger.warn('Synthesis failed, joining responses', { error: errorMessage(error) });
      return responses.join('\n\n');
    }
  }
}

export { IntentClassifier, normalizeAgentName, parseClassification } from './intentClassifier';
export * from './types';
