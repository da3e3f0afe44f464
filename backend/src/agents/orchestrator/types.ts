/**
 * TypeScript interfaces for the Root Agent
 */

import { z } from 'zod';
import type { SubAgent } from '../context';
import { AgentType } from '../../types/agent.types';

export { AgentType };
export type { IntentClassification } from '../../types/agent.types';

/**
 * Classification JSON as the model writes it
 */
export const rawClassificationSchema = z.object({
  primary_agent: z.string(),
  secondary_agents: z.array(z.string()).default([]),
  reasoning: z.string().default(''),
  sub_tasks: z.union([z.record(z.string()), z.array(z.string())]).default({})
});

export type RawClassification = z.infer<typeof rawClassificationSchema>;

export interface ClassificationCriteria {
  visualizationKeywords: string[];
  mlPatterns: RegExp[];
  analyticsKeywords: string[];
  analyticsPatterns: RegExp[];
}

export type SubAgents = Record<AgentType, SubAgent>;

/** Where each agent's last answer is kept and how it is named in history */
export const AGENT_OUTPUTS = {
  [AgentType.DATABASE]: { stateKey: 'db_agent_output', historyName: 'database' },
  [AgentType.ANALYTICS]: { stateKey: 'ds_agent_output', historyName: 'analytics' },
  [AgentType.ML]: { stateKey: 'bqml_agent_output', historyName: 'bqml' }
} as const;

export const PRIMARY_PREFIXES: Record<AgentType, string> = {
  [AgentType.DATABASE]: '🗄️ **Database Agent Response:**\n',
  [AgentType.ANALYTICS]: '📊 **Analytics Agent Response:**\n',
  [AgentType.ML]: '🤖 **BQML Agent Response:**\n'
};

export const SECONDARY_PREFIXES: Record<AgentType, string> = {
  [AgentType.DATABASE]: '🗄️ **Additional Database Analysis:**\n',
  [AgentType.ANALYTICS]: '📊 **Additional Analytics:**\n',
  [AgentType.ML]: '🤖 **Additional ML Recommendations:**\n'
};
