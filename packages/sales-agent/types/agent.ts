// Retrieval & orchestration request lifecycle and result shapes

import type { ContextResult, EntityMetadata, SearchScope } from './embeddings.js';

export type RequestState =
  | 'RECEIVED'
  | 'EMBEDDING_QUERY'
  | 'RETRIEVING'
  | 'CONTEXT_MERGED'
  | 'PROMPTING'
  | 'GENERATING'
  | 'DONE'
  | 'ERROR';

export type AgentTask =
  | 'open_query'
  | 'customer_analysis'
  | 'product_recommendation'
  | 'territory_analysis'
  | 'sales_pitch'
  | 'general_insights';

export interface RequestStateChange {
  requestId: string;
  task: AgentTask;
  from: RequestState;
  to: RequestState;
  error?: string;
}

export interface QueryResult {
  answer: string;
  contextCount: number;
  contextDetails: ContextResult[];
  scope: SearchScope;
  /** The user prompt sent to the generation service */
  prompt: string;
  /** true when generation failed and `answer` carries the error text */
  degraded: boolean;
  timestamp: string;
}

export type CustomerAnalysisResult =
  | {
      found: true;
      analysis: string;
      customer: { key: string; metadata: EntityMetadata };
      degraded: boolean;
      timestamp: string;
    }
  | {
      found: false;
      error: string;
      suggestions: string[];
      timestamp: string;
    };

export interface ProductRecommendationResult {
  recommendations: string;
  productsAnalyzed: number;
  degraded: boolean;
  timestamp: string;
}

export interface TerritoryAnalysisResult {
  analysis: string;
  territory: { key: string; metadata: EntityMetadata } | null;
  degraded: boolean;
  timestamp: string;
}

export interface SalesPitchResult {
  pitch: string;
  personalizationLevel: number;
  degraded: boolean;
  timestamp: string;
}

export interface InsightsResult {
  insights: string;
  dataPointsAnalyzed: number;
  degraded: boolean;
  timestamp: string;
}
