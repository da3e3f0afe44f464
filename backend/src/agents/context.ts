/**
 * Agent context: state and history shared by the agents for one conversation
 */

import type { HistoryEntry } from '../types/chat.types';
import { agentStateSchema } from '../types/agent.types';
import type { AgentState, AgentStateKey } from '../types/agent.types';

export interface AgentContext {
  getState<K extends AgentStateKey>(key: K): AgentState[K];
  updateState<K extends AgentStateKey>(key: K, value: AgentState[K]): void;
  addToHistory(agent: string, query: string, response: string): void;
  getRecentHistory(count: number): HistoryEntry[];
}

/**
 * Read persisted state; keys that no longer match their shape are dropped
 */
export const parseAgentState = (raw: Record<string, unknown>): AgentState => {
  const parsed = agentStateSchema.safeParse(raw);
  return parsed.success ? parsed.data : {};
};

export abstract class BaseAgentContext implements AgentContext {
  protected state: AgentState;
  protected history: HistoryEntry[];

  constructor(state: AgentState = {}, history: HistoryEntry[] = []) {
    this.state = state;
    this.history = history;
  }

  /** Called after every mutation */
  protected abstract persist(): void;

  getState<K extends AgentStateKey>(key: K): AgentState[K] {
    return this.state[key];
  }

  updateState<K extends AgentStateKey>(key: K, value: AgentState[K]): void {
    this.state[key] = value;
    this.persist();
  }

  addToHistory(agent: string, query: string, response: string): void {
    this.history.push({
      agent,
      query,
      response,
      timestamp: new Date().toISOString()
    });
    this.persist();
  }

  getRecentHistory(count: number): HistoryEntry[] {
    return count > 0 ? this.history.slice(-count) : [];
  }

  snapshot(): { state: AgentState; history: HistoryEntry[] } {
    return { state: { ...this.state }, history: [...this.history] };
  }
}

/**
 * Context for one-off requests (uploads) that belong to no session
 */
export class InMemoryAgentContext extends BaseAgentContext {
  protected persist(): void {
    // nothing outlives the request
  }
}

/**
 * A specialist the root agent can dispatch to
 */
export interface SubAgent {
  processQuery(query: string, context?: AgentContext): Promise<string>;
}
