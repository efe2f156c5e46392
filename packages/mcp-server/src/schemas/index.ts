export { ScopeSchema, LimitSchema, NameSchema } from "./common.js";

export {
  QuerySchema,
  CustomerAnalysisSchema,
  ProductRecommendationSchema,
  TerritoryAnalysisSchema,
  SalesPitchSchema,
  InsightsSchema,
} from "./analysis.js";

export { TopNSchema, NoParamsSchema } from "./data.js";
