/**
 * Prompt templates for the Analytics Agent
 */

import { PromptTemplate } from '@langchain/core/prompts';

export const ANALYTICS_INSTRUCTION = `You are a data analytics expert specializing in statistical analysis and data visualization.

Your capabilities include exploratory data analysis, statistical testing, visualization design, time series analysis, correlation analysis and feature engineering.

Always provide:
1. The analytical approach and methodology
2. Statistical interpretation of results
3. Visualization recommendations
4. Next steps or deeper analyses to consider

Use appropriate statistical tests, explain significance in plain language and give actionable insights.`;

export const CHART_SPEC_PROMPT = new PromptTemplate({
  template: `Choose a chart for the request below using only the available columns.

User Request: {query}
Columns: {columns}
Sample Rows: {sample}

Respond with JSON only, in this shape:
{{"type": "bar" | "line" | "pie" | "scatter" | "area", "x": "<column>", "y": "<numeric column or null to count rows>", "title": "<chart title>"}}`,
  inputVariables: ['query', 'columns', 'sample']
});

export const STATISTICS_PROMPT = new PromptTemplate({
  template: `Interpret the statistics below for the user.

User Query: {query}

Computed Statistics:
{statistics}

Explain the key findings with the actual numbers, call out outliers and notable correlations, and suggest next steps. Be concise.`,
  inputVariables: ['query', 'statistics']
});

export const GENERAL_ANALYTICS_PROMPT = new PromptTemplate({
  template: `User Query: {query}
{contextInfo}
Provide an analysis with:
1. Approach and methodology
2. Statistical interpretation
3. Actionable insights and recommendations
4. Next steps for deeper analysis

Keep the response practical and focused on delivering value to the user.`,
  inputVariables: ['query', 'contextInfo']
});
