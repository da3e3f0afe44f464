import { ChatGoogleGenerativeAI } from '@langchain/google-genai';
import { env } from './env';
import { createComponentLogger } from './logger';

const logger = createComponentLogger('gemini');

export interface GeminiConfig {
  apiKey: string;
  model: string;
  maxOutputTokens: number;
}

export const getGeminiConfig = (): GeminiConfig => ({
  apiKey: env.GOOGLE_API_KEY,
  model: env.GEMINI_MODEL,
  maxOutputTokens: env.GEMINI_MAX_OUTPUT_TOKENS
});

export function isGeminiConfigured(): boolean {
  return env.GOOGLE_API_KEY.length > 0;
}

/**
 * Build a chat model bound to one sampling temperature
 */
export function createChatModel(temperature: number, config: GeminiConfig = getGeminiConfig()): ChatGoogleGenerativeAI {
  if (!config.apiKey) {
    throw new Error('GOOGLE_API_KEY is not configured');
  }

  logger.debug('Creating Gemini chat model', { model: config.model, temperature });

  return new ChatGoogleGenerativeAI({
    model: config.model,
    apiKey: config.apiKey,
    temperature,
    maxOutputTokens: config.maxOutputTokens
  });
}
