/**
 * Language model service
 * Thin wrapper around Gemini chat models so agents can be tested with a fake
 */

import { HumanMessage, SystemMessage } from '@langchain/core/messages';
import type { BaseMessage } from '@langchain/core/messages';
import { StringOutputParser } from '@langchain/core/output_parsers';
import { createChatModel } from '../config/gemini';
import { createComponentLogger } from '../config/logger';

const logger = createComponentLogger('llm-service');

export interface GenerateOptions {
  temperature?: number;
  system?: string;
}

export interface LanguageModel {
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}

/**
 * The part of a LangChain chat model the service calls
 */
export interface ChatModel {
  invoke(input: BaseMessage[]): Promise<BaseMessage>;
}

export type ChatModelFactory = (temperature: number) => ChatModel;

export class GeminiLanguageModel implements LanguageModel {
  private readonly models = new Map<number, ChatModel>();
  private readonly parser = new StringOutputParser();

  constructor(
    private readonly defaultTemperature = 0.1,
    private readonly factory: ChatModelFactory = temperature => createChatModel(temperature)
  ) {}

  private modelFor(temperature: number): ChatModel {
    let model = this.models.get(temperature);
    if (!model) {
      model = this.factory(temperature);
      this.models.set(temperature, model);
    }
    return model;
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const temperature = options.temperature ?? this.defaultTemperature;
    const messages: BaseMessage[] = [];
    if (options.system) {
      messages.push(new SystemMessage(options.system));
    }
    messages.push(new HumanMessage(prompt));

    const startTime = Date.now();
    try {
      const reply = await this.modelFor(temperature).invoke(messages);
      const text = await this.parser.invoke(reply);
      logger.debug('Model response received', {
        temperature,
        promptLength: prompt.length,
        responseLength: text.length,
        durationMs: Date.now() - startTime
      });
      return text;
    } catch (error) {
      logger.error('Model call failed', {
        temperature,
        error: error instanceof Error ? error.message : String(error)
      });
      throw error;
    }
  }
}
