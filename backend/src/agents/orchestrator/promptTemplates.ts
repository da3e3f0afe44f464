/**
 * Prompt Templates for the Root Agent
 */

import { PromptTemplate } from '@langchain/core/prompts';
import type { HistoryEntry } from '../../types/chat.types';

export const ROOT_INSTRUCTION = `You are a Data Science Multi-Agent assistant. Your role is to understand user queries and route them to specialized agents that can provide accurate, actionable answers.

Available agents:
1. Database agent: counting, aggregating, filtering and looking up records in BigQuery
2. Analytics agent: statistical analysis, correlations, charts and analysis methodology
3. BQML agent: predictions, model building and machine learning recommendations

Response guidelines:
- Provide direct, concise answers
- Use natural language, not code
- Focus on answering the specific question asked`;

/**
 * System instruction used when the root agent answers directly
 */
export function globalInstruction(today: Date): string {
  return `You are a Data Science and Data Analytics Multi Agent System.
Today's date: ${today.toISOString().slice(0, 10)}

${ROOT_INSTRUCTION}`;
}

/**
 * Routing prompt: the model answers with JSON naming the agents to call
 */
export const CLASSIFICATION_PROMPT = new PromptTemplate({
  template: `You are a routing agent that determines which specialized agent should handle a query.

Current Query: {message}
{historyText}
{resultContext}

CONTEXT AWARENESS:
- If there are previous query results in the conversation, consider whether the current query references them
- Look for pronouns (it, they, these, those) or references to "the data" or "results"

ROUTING RULES:

1. DATABASE AGENT - the user wants ACTUAL DATA from the database:
   - Questions starting with "Which", "What", "How many", "List", "Show me", "Get" or "Find"
   - Questions about specific people, locations, departments, counts or records

2. ANALYTICS AGENT - the user wants:
   - Code examples or instructions on HOW to analyze data
   - Statistical analysis methodology or analysis of previous results

3. DATABASE + ANALYTICS - the user wants data AND a chart, graph or visualization:
   - use "database" as primary_agent and ["analytics"] as secondary_agents

4. ML AGENT - model creation, training, predictions or ML algorithm recommendations

When in doubt, if the query asks for information that exists in the database, choose "database".

Schema:
{schema}

Return a JSON object with:
{{
  "primary_agent": "database" | "analytics" | "ml",
  "secondary_agents": ["additional agents"],
  "reasoning": "explanation of routing decision",
  "sub_tasks": {{"agent_name": "task for that agent"}}
}}`,
  inputVariables: ['message', 'historyText', 'resultContext', 'schema']
});

export const SYNTHESIS_PROMPT = new PromptTemplate({
  template: `Synthesize the following agent responses into a coherent answer for the user:

Original Query: {message}

Agent Responses:
{responses}

IMPORTANT: Provide a DIRECT and CONCISE unified answer. Focus on the key findings and actionable insights without lengthy explanations.`,
  inputVariables: ['message', 'responses']
});

/**
 * Format recent agent history for the routing prompt
 */
export function formatRecentHistory(entries: HistoryEntry[]): string {
  if (entries.length === 0) {
    return '';
  }
  const lines = entries.map(entry => `- ${entry.agent}: ${entry.query.slice(0, 100)}...`);
  return `\nRecent conversation history:\n${lines.join('\n')}\n`;
}

export function formatResultContext(result: unknown, maxChars: number): string {
  if (result === undefined || (Array.isArray(result) && result.length === 0)) {
    return '';
  }
  return `\n\nLast query result available: ${JSON.stringify(result).slice(0, maxChars)}...`;
}

export const SERVICE_DISABLED_MESSAGE =
  'The Google Generative AI service needs to be enabled. Please check your API configuration.';

export function errorResponse(message: string): string {
  if (message.includes('SERVICE_DISABLED')) {
    return SERVICE_DISABLED_MESSAGE;
  }
  return `I encountered an error while processing your request: ${message}. Please try rephrasing your question.`;
}
