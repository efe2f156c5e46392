// Task prompts for the sales agent. Each task pairs a system instruction with
// a user prompt that embeds the formatted retrieval context.

import type { AgentTask } from '../types/agent.js';

export const SYSTEM_PROMPTS: Record<AgentTask, string> = {
  open_query: `You are an expert sales agent with access to complete sales data.
Your job is to:
1. Analyze the user's question and provide valuable insights
2. Make recommendations based on real data
3. Identify sales opportunities
4. Propose personalized strategies
5. Keep a professional but friendly tone

Always ground your answer in the data provided and be specific with numbers and examples.
If the information is insufficient, say which additional data you would need.`,

  customer_analysis: `You are an expert sales analyst. Analyze the customer profile and provide:
1. Customer summary
2. Purchase history
3. Growth potential
4. Recommended products
5. Suggested sales strategy
6. Risks and opportunities`,

  product_recommendation: `You are a product expert who makes data-driven recommendations.
Provide:
1. Top 3 recommended products
2. Reasons for each recommendation
3. Ideal customer segments
4. Pricing strategies
5. Performance metrics`,

  territory_analysis: `You are a sales territory analyst. Provide:
1. Territory performance
2. Comparison with other territories
3. Growth opportunities
4. Best-performing products
5. Expansion strategies
6. Market risks`,

  sales_pitch: `You are an expert salesperson who writes personalized, persuasive pitches.
Write a pitch that:
1. Speaks directly to the customer
2. Highlights relevant benefits
3. Uses concrete data
4. Includes calls to action
5. Addresses likely objections
6. Is professional but compelling`,

  general_insights: `You are a senior sales consultant who provides strategic insights.
Analyze the data and provide:
1. Identified trends
2. Market opportunities
3. Strategic recommendations
4. Key metrics
5. Suggested next steps`,
};

/** Text embedded to retrieve context for each task */
export const RETRIEVAL_QUERIES = {
  customer: (name: string) => `Complete analysis of customer ${name}`,
  products: (criteria: string) => `Recommended products for ${criteria}`,
  territory: (name: string) => `Analysis of territory ${name}`,
  pitch: (name: string, focus: string) => `Sales pitch for ${name} ${focus}`.trim(),
};

export function openQueryPrompt(query: string, context: string): string {
  return `User question: ${query}

Relevant information from the database:
${context}

Please provide a complete and useful answer based on this information.`;
}

export function customerAnalysisPrompt(context: string): string {
  return `Analyze this customer in detail:
${context}

Provide a complete analysis and actionable recommendations.`;
}

export function productRecommendationPrompt(criteria: string, context: string): string {
  return `Customer criteria: ${criteria}

Available products:
${context}

Provide specific recommendations with data-backed justification.`;
}

export function territoryAnalysisPrompt(context: string): string {
  return `Analyze this territory:
${context}

Provide strategic insights and actionable recommendations.`;
}

export function salesPitchPrompt(customer: string, productFocus: string, context: string): string {
  return `Target customer: ${customer}
Product focus: ${productFocus}

Customer and market information:
${context}

Write a personalized, persuasive sales pitch.`;
}

export function insightsPrompt(query: string, context: string): string {
  return `Query: ${query}

Available data:
${context}

Provide valuable insights and strategic recommendations.`;
}

export const NOT_FOUND_SUGGESTIONS = [
  'Verify the customer name',
  'Search by partial name',
  'Review the database',
];
