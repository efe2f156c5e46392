import {
  CustomerAnalysisSchema,
  InsightsSchema,
  ProductRecommendationSchema,
  QuerySchema,
  SalesPitchSchema,
  TerritoryAnalysisSchema,
} from "../schemas/analysis.js";
import { defineTool, type SalesOperations, type SalesTool } from "./define.js";

export function analysisTools(service: SalesOperations): SalesTool[] {
  return [
    defineTool(
      "sales_query",
      "Answer a business question from retrieved customer, product and territory context: semantic retrieval over the sales index, optional scope restriction, grounded answer with the number of context items used",
      QuerySchema,
      (p) => service.query(p.query, p.context_type),
    ),
    defineTool(
      "analyze_customer",
      "Customer analysis: profile summary, purchase history, growth potential, recommended products, sales strategy, risks and opportunities. Partial, case-insensitive name match; unknown customers return suggestions",
      CustomerAnalysisSchema,
      (p) => service.analyzeCustomer(p.customer_name),
    ),
    defineTool(
      "recommend_products",
      "Product recommendations for a customer profile: top products with reasons, ideal segments, pricing strategy and performance metrics",
      ProductRecommendationSchema,
      (p) => service.recommendProducts(p.customer_criteria),
    ),
    defineTool(
      "analyze_territory",
      "Territory analysis: performance, comparison with other territories, growth opportunities, best products, expansion strategies, market risks",
      TerritoryAnalysisSchema,
      (p) => service.analyzeTerritory(p.territory_name),
    ),
    defineTool(
      "generate_sales_pitch",
      "Personalized sales pitch for a customer with optional product focus: relevant benefits, concrete data, calls to action, objection handling",
      SalesPitchSchema,
      (p) => service.generatePitch(p.customer_name, p.product_focus),
    ),
    defineTool(
      "sales_insights",
      "Strategic insights across all sales data: trends, market opportunities, recommendations, key metrics, next steps",
      InsightsSchema,
      (p) => service.getInsights(p.query),
    ),
  ];
}
