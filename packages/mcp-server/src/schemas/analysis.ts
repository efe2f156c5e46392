import { z } from "zod";
import { NameSchema, ScopeSchema } from "./common.js";

export const QuerySchema = z.object({
  query: NameSchema.describe("Business question in natural language"),
  context_type: ScopeSchema,
});

export const CustomerAnalysisSchema = z.object({
  customer_name: NameSchema.describe("Customer name; partial names match"),
});

export const ProductRecommendationSchema = z.object({
  customer_criteria: NameSchema.describe("Customer profile or need the products should fit"),
});

export const TerritoryAnalysisSchema = z.object({
  territory_name: NameSchema.describe("Sales territory, e.g. EMEA, NA, APAC"),
});

export const SalesPitchSchema = z.object({
  customer_name: NameSchema.describe("Target customer name"),
  product_focus: z.string().default("").describe("Product line or product to feature"),
});

export const InsightsSchema = z.object({
  query: NameSchema.describe("Topic for strategic insights"),
});
